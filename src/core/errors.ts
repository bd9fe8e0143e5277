/**
 * Error classes raised by the translation engine
 */

export type BridgeErrorCode =
  | 'MISSING_IDENTITY'
  | 'MALFORMED_INPUT'
  | 'SCHEMA_LOAD_FAILED'
  | 'CATALOG_MISSING'
  | 'CATALOG_FILE_INVALID'
  | 'INVALID_CONFIG';

/**
 * Base class for bridge errors
 */
export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly originalError?: Error;

  constructor(message: string, code: BridgeErrorCode, originalError?: Error) {
    super(originalError ? `${message}: ${originalError.message}` : message);
    this.name = 'BridgeError';
    this.code = code;
    this.originalError = originalError;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BridgeError);
    }
  }
}

/**
 * No usable id/name could be derived from an input record
 */
export class MissingIdentityError extends BridgeError {
  public readonly fields: readonly string[];

  constructor(fields: readonly string[], message?: string) {
    super(
      message ?? `Record has no usable identity (tried: ${fields.join(', ')})`,
      'MISSING_IDENTITY'
    );
    this.name = 'MissingIdentityError';
    this.fields = fields;
  }
}

/**
 * Input is not parseable JSON or not a JSON object
 */
export class MalformedInputError extends BridgeError {
  constructor(message: string = 'Malformed input record', originalError?: Error) {
    super(message, 'MALFORMED_INPUT', originalError);
    this.name = 'MalformedInputError';
  }
}

/**
 * The AgentFacts schema could not be read or is not a usable JSON Schema
 */
export class SchemaLoadError extends BridgeError {
  public readonly schemaPath?: string;

  constructor(message: string, schemaPath?: string, originalError?: Error) {
    super(message, 'SCHEMA_LOAD_FAILED', originalError);
    this.name = 'SchemaLoadError';
    this.schemaPath = schemaPath;
  }
}

export class CatalogMissingError extends BridgeError {
  public readonly catalogRoot: string;

  constructor(catalogRoot: string) {
    super(`Taxonomy catalog not found at ${catalogRoot}`, 'CATALOG_MISSING');
    this.name = 'CatalogMissingError';
    this.catalogRoot = catalogRoot;
  }
}

export class CatalogFileError extends BridgeError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, originalError?: Error) {
    super(`Failed loading taxonomy file ${filePath} (${reason})`, 'CATALOG_FILE_INVALID', originalError);
    this.name = 'CatalogFileError';
    this.filePath = filePath;
  }
}

export class ConfigurationError extends BridgeError {
  public readonly variables: readonly string[];

  constructor(message: string, variables: readonly string[] = []) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigurationError';
    this.variables = variables;
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

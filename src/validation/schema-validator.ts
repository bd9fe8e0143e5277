/**
 * Declarative record validation against a Draft-7 JSON Schema, compiled by ajv.
 *
 * Record validation never throws: failures come back as addressable
 * {@link ValidationError}s sorted by path. The only fatal condition is a
 * schema that cannot be loaded, raised once at construction.
 */

import { readFileSync } from 'node:fs';
import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { SchemaLoadError, toError } from '../core/errors.js';
import type { ValidationError, ValidationPath, ValidationResult } from '../models/validation-types.js';
import { hasSameInstanceRefCycle } from './schema-document.js';

const isSchemaDocument = (value: unknown): value is SchemaObject | boolean =>
  typeof value === 'boolean' || (typeof value === 'object' && value !== null && !Array.isArray(value));

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// `format` is annotation only; records carry placeholder URLs.
const createAjv = (): Ajv => new Ajv({ allErrors: true, strict: false, validateFormats: false });

/**
 * Orders paths segment by segment: numbers before strings, numbers
 * numerically, strings by code unit, and a prefix before its extensions.
 */
export const comparePaths = (a: ValidationPath, b: ValidationPath): number => {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const left = a[i];
    const right = b[i];
    if (left === right) {
      continue;
    }
    if (typeof left === 'number' && typeof right === 'number') {
      return left - right;
    }
    if (typeof left === 'number') {
      return -1;
    }
    if (typeof right === 'number') {
      return 1;
    }
    return left < right ? -1 : 1;
  }
  return a.length - b.length;
};

const formatMessage = (error: ErrorObject): string => {
  const message = error.message ?? `failed ${error.keyword}`;
  if (error.keyword === 'additionalProperties') {
    return `${message} ('${String(error.params.additionalProperty)}')`;
  }
  return message;
};

const toValidationError = (record: unknown, error: ErrorObject): ValidationError => {
  const path: ValidationPath = [];
  let value: unknown = record;
  const tokens = error.instancePath === '' ? [] : error.instancePath.split('/').slice(1);
  for (const raw of tokens) {
    const token = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (Array.isArray(value)) {
      const index = Number(token);
      path.push(index);
      value = value[index];
    } else {
      path.push(token);
      value = isPlainObject(value) ? value[token] : undefined;
    }
  }
  return { path, rule: error.keyword, message: formatMessage(error), value };
};

export class SchemaValidator {
  readonly schema: SchemaObject | boolean;
  readonly source?: string;
  private readonly check: ValidateFunction;

  /**
   * @param document - parsed JSON Schema document
   * @param source - where the document came from, used in error messages
   * @throws SchemaLoadError when the document is not a usable schema
   */
  constructor(document: unknown, source?: string) {
    const where = source ? ` ${source}` : '';
    if (!isSchemaDocument(document)) {
      throw new SchemaLoadError(`Invalid JSON Schema document${where}: expected an object or a boolean`, source);
    }
    if (hasSameInstanceRefCycle(document)) {
      throw new SchemaLoadError(`Schema${where} has a $ref cycle that never descends into the record`, source);
    }
    let check: ValidateFunction;
    try {
      check = createAjv().compile(document);
    } catch (error) {
      throw new SchemaLoadError(`Invalid JSON Schema document${where}`, source, toError(error));
    }
    this.check = check;
    this.schema = document;
    this.source = source;
  }

  static fromFile(schemaPath: string): SchemaValidator {
    let text: string;
    try {
      text = readFileSync(schemaPath, 'utf-8');
    } catch (error) {
      throw new SchemaLoadError(`AgentFacts schema not found at ${schemaPath}`, schemaPath, toError(error));
    }
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new SchemaLoadError(`Invalid JSON in schema file ${schemaPath}`, schemaPath, toError(error));
    }
    return new SchemaValidator(document, schemaPath);
  }

  /**
   * Errors are sorted by path; within one path they keep the order ajv
   * reports them in.
   */
  validate(record: unknown): ValidationResult {
    if (this.check(record)) {
      return { valid: true, errors: [] };
    }
    const errors = (this.check.errors ?? [])
      .map((error) => toValidationError(record, error))
      .sort((a, b) => comparePaths(a.path, b.path));
    return { valid: errors.length === 0, errors };
  }
}

/**
 * One-off validation against a schema document.
 *
 * @throws SchemaLoadError when `schema` cannot be compiled
 */
export const validateAgainstSchema = (record: unknown, schema: unknown): ValidationResult =>
  new SchemaValidator(schema).validate(record);

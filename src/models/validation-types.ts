/**
 * Structured errors reported by the schema validator.
 */

/** The JSON Schema keyword that failed, e.g. `required` or `minItems`. */
export type ValidationRule = string;

export type ValidationPath = Array<string | number>;

export interface ValidationError {
  path: ValidationPath;
  message: string;
  rule: ValidationRule;
  value: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

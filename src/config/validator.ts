/**
 * Configuration Validator
 *
 * Validates configuration data against JSON Schemas using Ajv.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { LoginConfig } from './types.js';
import { loginConfigSchema } from './schema.js';

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with a typed value or failure with errors
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationError[] };

/**
 * Shared Ajv instance. Every schema in the project is compiled against it.
 */
export const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});
addFormats.default(ajv);

const validateLogin = ajv.compile<LoginConfig>(loginConfigSchema);

/**
 * Run a compiled validator and collect its errors.
 */
export function runValidator<T>(
  validate: ValidateFunction<T>,
  data: unknown
): ValidationResult<T> {
  if (!validate(data)) {
    const errors: ValidationError[] = (validate.errors ?? []).map(
      (error: ErrorObject) => ({
        path: error.instancePath || '/',
        message: error.message ?? 'Unknown validation error',
        params: error.params,
      })
    );
    return { valid: false, errors };
  }

  return { valid: true, value: data };
}

/**
 * Validate login configuration data against the schema.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateLoginConfig(data: unknown): ValidationResult<LoginConfig> {
  return runValidator(validateLogin, data);
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => `  - ${error.path || '/'}: ${error.message}`)
    .join('\n');
}

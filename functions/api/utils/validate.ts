// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

import { ZodError, type ZodIssueCode, type ZodType, type ZodTypeDef } from 'zod';
import { ValidationError } from './errors.ts';

/**
 * Validate data against a Zod schema
 * Throws ValidationError with formatted errors if validation fails
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const formattedErrors = error.errors.map((err) => ({
        field: err.path.join('.') || 'query',
        message: err.message,
        code: zodIssueCodeToErrorCode(err.code),
      }));

      throw new ValidationError('Request validation failed', formattedErrors);
    }
    throw error;
  }
}

/**
 * Validate query parameters from URL
 */
export function validateQuery<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  url: URL
): T {
  const params: Record<string, string> = {};
  url.searchParams.forEach((value, key) => {
    params[key] = value;
  });
  return validate(schema, params);
}

/**
 * Map Zod issue codes to our error codes
 */
function zodIssueCodeToErrorCode(code: ZodIssueCode): string {
  const mapping: Record<string, string> = {
    invalid_type: 'type_error',
    invalid_literal: 'invalid_format',
    invalid_string: 'invalid_format',
    too_small: 'min_length',
    too_big: 'max_length',
    invalid_enum_value: 'invalid_format',
    unrecognized_keys: 'invalid_format',
    custom: 'validation_error',
  };
  return mapping[code] || 'validation_error';
}

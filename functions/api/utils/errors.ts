// ============================================================================
// APPLICATION ERRORS
// ============================================================================

import {
  BackendError,
  ConfigError,
  UnknownTypeRequested,
} from '../../_shared/benchmark_catalog/errors.ts';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNKNOWN_BENCHMARK_TYPE'
  | 'CONFIG_ERROR'
  | 'BACKEND_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly errors: Array<{ field: string; message: string; code: string }>
  ) {
    super('VALIDATION_ERROR', message, 400, { errors });
    this.name = 'ValidationError';
  }
}

/**
 * Maps catalog failures onto HTTP-facing errors. Returns `null` for errors it does not know.
 */
export function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof UnknownTypeRequested) {
    return new AppError('UNKNOWN_BENCHMARK_TYPE', error.message, 404, { type: error.type });
  }
  if (error instanceof ConfigError) {
    return new AppError('CONFIG_ERROR', error.message, 500, { issues: error.issues });
  }
  if (error instanceof BackendError) {
    return new AppError('BACKEND_ERROR', error.message, 502, {
      operation: error.operation,
      ...(error.metricName ? { metric: error.metricName } : {}),
    });
  }
  return null;
}

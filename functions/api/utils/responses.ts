// ============================================================================
// RESPONSE UTILITIES
// ============================================================================

import { AppError, ValidationError } from './errors.ts';

/**
 * Standard JSON response
 */
export function jsonResponse<T>(
  data: T,
  status: number = 200,
  headers: Headers = new Headers()
): Response {
  headers.set('Content-Type', 'application/json');

  return new Response(JSON.stringify(data), {
    status,
    headers,
  });
}

/**
 * Error response from AppError
 */
export function errorResponse(
  error: AppError,
  requestId: string,
  headers: Headers = new Headers()
): Response {
  const body: { error: Record<string, unknown>; request_id: string; timestamp: string } = {
    error: {
      code: error.code,
      message: error.message,
    },
    request_id: requestId,
    timestamp: new Date().toISOString(),
  };

  if (error instanceof ValidationError) {
    body.error.errors = error.errors;
  } else if (error.details) {
    Object.assign(body.error, error.details);
  }

  return jsonResponse(body, error.statusCode, headers);
}

/**
 * Internal error response (500) - hides implementation details
 */
export function internalErrorResponse(requestId: string): Response {
  return jsonResponse({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Check the server logs for this request_id.',
    },
    request_id: requestId,
    timestamp: new Date().toISOString(),
  }, 500);
}

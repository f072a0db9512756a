/**
 * Standardized Error Types
 *
 * Every failure a client can see is an AppError. The response body is always
 * `{ error: <message> }`; the correlation ID travels in the response header.
 */

/**
 * Standard API error response format.
 */
export interface ApiErrorResponse {
  error: string;
}

/**
 * Application error class with HTTP status code.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Convert to API response format.
   */
  toResponse(): ApiErrorResponse {
    return { error: this.message };
  }
}

/**
 * Pre-defined error factories for common error types.
 */
export const Errors = {
  // 400 Bad Request
  VALIDATION_ERROR: (message: string, details?: Record<string, unknown>) =>
    new AppError(400, 'VALIDATION_ERROR', message, details),

  NAME_REQUIRED: () =>
    new AppError(400, 'VALIDATION_ERROR', 'Name is required'),

  INVALID_BODY: (statusCode = 400) =>
    new AppError(statusCode, 'INVALID_BODY', 'Invalid request body'),

  // 404 Not Found
  ITEM_NOT_FOUND: (itemId: number) =>
    new AppError(404, 'NOT_FOUND', 'Item not found', { itemId }),

  ROUTE_NOT_FOUND: () =>
    new AppError(404, 'ROUTE_NOT_FOUND', 'Endpoint not found'),

  // 500 Internal Server Error
  INTERNAL_ERROR: () =>
    new AppError(500, 'INTERNAL_ERROR', 'Internal server error'),
};

/**
 * Check if an error is an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

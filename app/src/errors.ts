/**
 * ApiError — structured HTTP error for the to-do API.
 *
 * Extends native Error so stack traces survive into logs, while carrying the
 * HTTP `status` and the wire body `{ error: { code, message } }` that every
 * failure response uses.
 *
 * Catch handlers match with `ApiError.isApiError(err)`.
 */
import type { ErrorCode, ErrorResponse } from './types.js';

export class ApiError extends Error {
  /**
   * HTTP status code for the error response.
   */
  readonly status: number;

  /** Machine-readable error code (e.g. NOT_FOUND). */
  readonly code: ErrorCode;

  /**
   * @param status - HTTP status code (e.g., 400, 401, 404, 500)
   * @param code - error code placed in the response body
   * @param message - client-safe message placed in the response body
   */
  constructor(status: number, code: ErrorCode, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;

    Object.setPrototypeOf(this, ApiError.prototype);
  }

  /** Wire body for this error. */
  get body(): ErrorResponse {
    return { error: { code: this.code, message: this.message } };
  }

  static isApiError(err: unknown): err is ApiError {
    return err instanceof ApiError;
  }

  static unauthorized(message: string): ApiError {
    return new ApiError(401, 'UNAUTHORIZED', message);
  }

  static invalidInput(message: string): ApiError {
    return new ApiError(400, 'INVALID_INPUT', message);
  }

  static notFound(message = 'resource not found'): ApiError {
    return new ApiError(404, 'NOT_FOUND', message);
  }
}

/** Build the `{ error: { code, message } }` envelope without throwing. */
export function errorBody(code: ErrorCode, message: string): ErrorResponse {
  return { error: { code, message } };
}

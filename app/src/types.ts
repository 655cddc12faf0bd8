/**
 * Wire types shared across routes and middleware.
 */

export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'INTERNAL_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_INPUT'
  | 'INVALID_JSON'
  | 'INVALID_STATUS'
  | 'METHOD_NOT_ALLOWED'
  | 'PAYLOAD_TOO_LARGE';

export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
  };
}

export interface HealthResponse {
  status: 'ok';
}

/** Log callback injected into components that emit structured logs. */
export type LogCallback = (
  level: 'error' | 'warn' | 'info' | 'debug',
  data: Record<string, unknown>,
) => void;

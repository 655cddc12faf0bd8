import type { Context } from 'hono';
import { ApiError, errorBody } from '../errors.js';
import type { LogCallback } from '../types.js';

/**
 * App-level error handler — maps ApiError to its structured response and
 * everything else to a generic 500, logging the failure server-side.
 *
 * Registered with `app.onError`, so a throw anywhere below the middleware
 * stack still produces the `{ error: { code, message } }` envelope.
 */
export function createErrorHandler(log: LogCallback) {
  return (err: Error, c: Context) => {
    if (ApiError.isApiError(err)) {
      return c.json(err.body, statusOf(err));
    }

    log('error', {
      event: 'unhandled_error',
      request_id: c.get('requestId') ?? '',
      method: c.req.method,
      path: c.req.path,
      message: err.message,
      stack: err.stack,
    });
    return c.json(errorBody('INTERNAL_ERROR', 'internal server error'), 500);
  };
}

/** 404 for unmatched routes, in the same envelope as every other error. */
export function handleNotFound(c: Context) {
  return c.json(errorBody('NOT_FOUND', 'resource not found'), 404);
}

/** 405 for a known path with an unsupported method. */
export function methodNotAllowed(c: Context) {
  return c.json(errorBody('METHOD_NOT_ALLOWED', 'method not allowed'), 405);
}

type ErrorStatus = 400 | 401 | 403 | 404 | 405 | 409 | 413 | 429 | 500 | 503;

const KNOWN_STATUSES: ReadonlySet<number> = new Set([400, 401, 403, 404, 405, 409, 413, 429, 500, 503]);

function isErrorStatus(status: number): status is ErrorStatus {
  return KNOWN_STATUSES.has(status);
}

function statusOf(err: ApiError): ErrorStatus {
  return isErrorStatus(err.status) ? err.status : 500;
}

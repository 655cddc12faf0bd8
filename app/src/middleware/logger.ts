import { createMiddleware } from 'hono/factory';
import type { MiddlewareHandler } from 'hono';
import type { LogCallback } from '../types.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const SEVERITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

export interface Logger {
  /** Request logging middleware. */
  middleware: MiddlewareHandler;
  log: LogCallback;
}

/**
 * Structured JSON logger.
 *
 * `log` writes one line `{level, timestamp, service, ...data}` when the level
 * passes the threshold. The middleware adds one `request` entry per request:
 * request_id, method, path, status, duration_ms and, once the auth gate has
 * bound one, user_id. Request headers are never copied into an entry.
 */
export function createLogger(
  serviceName: string,
  threshold: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stdout.write(line),
): Logger {
  const log: LogCallback = (level, data) => {
    if (SEVERITY[level] > SEVERITY[threshold]) return;
    write(
      JSON.stringify({
        level,
        timestamp: new Date().toISOString(),
        service: serviceName,
        ...data,
      }) + '\n',
    );
  };

  const middleware = createMiddleware(async (c, next) => {
    const startedAt = performance.now();
    await next();

    const status = c.res.status;
    const userId = c.get('userId');
    log(status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info', {
      event: 'request',
      request_id: c.get('requestId') ?? '',
      method: c.req.method,
      path: c.req.path,
      status,
      duration_ms: Math.round(performance.now() - startedAt),
      ...(userId ? { user_id: userId } : {}),
    });
  });

  return { middleware, log };
}

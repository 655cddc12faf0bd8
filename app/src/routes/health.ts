import { Hono } from 'hono';
import type { HealthResponse } from '../types.js';
import { methodNotAllowed } from '../utils/error-handler.js';

/**
 * Liveness endpoint. Mounted at /health and exempt from authentication.
 */
export function createHealthRoutes(): Hono {
  const app = new Hono();

  app.get('/', (c) => {
    const body: HealthResponse = { status: 'ok' };
    return c.json(body);
  });

  app.all('/', methodNotAllowed);

  return app;
}

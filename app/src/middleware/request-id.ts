import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'X-Request-Id';

// Incoming ids end up in log lines; anything outside this shape is replaced.
const ACCEPTED_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Assigns every request an id, exposed as `requestId` in the context and
 * echoed in the X-Request-Id response header. A well-formed incoming id is
 * preserved; otherwise a random UUID is used.
 */
export const requestId = () =>
  createMiddleware(async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const id = incoming && ACCEPTED_ID.test(incoming) ? incoming : randomUUID();
    c.set('requestId', id);
    c.header(REQUEST_ID_HEADER, id);
    await next();
  });

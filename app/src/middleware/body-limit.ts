import { bodyLimit } from 'hono/body-limit';
import { errorBody } from '../errors.js';

/** Todo payloads are a title, a description and a timestamp. */
export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

/**
 * Request body size limit with the API's error envelope.
 *
 * A declared Content-Length over the limit is rejected before the handler
 * runs; a body without one is counted as the handler reads it.
 */
export function createBodyLimit(maxBytes: number = DEFAULT_MAX_BODY_BYTES) {
  return bodyLimit({
    maxSize: maxBytes,
    onError: (c) =>
      c.json(errorBody('PAYLOAD_TOO_LARGE', `body exceeds ${maxBytes} bytes`), 413),
  });
}

import path from 'node:path';
import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { errorBody } from '../errors.js';
import type { SigningKeySource } from '../services/key-set-cache.js';
import { IdentityNotFoundError } from '../services/identity-resolver.js';
import type { IdentityResolver } from '../services/identity-resolver.js';
import { verifyAccessToken } from '../services/token-verifier.js';
import type { LogCallback } from '../types.js';

export const HEALTH_PATH = '/health';
export const AUTH_PATH_PREFIX = '/api/v1/auth/';
export const DEV_USER_HEADER = 'X-User-ID';

const BEARER_PREFIX = 'Bearer ';
const INVALID_TOKEN = 'invalid or expired token';

/** Trusts X-User-ID as the caller. Only ever configured for local development. */
export interface DevBypassMode {
  kind: 'dev-bypass';
}

/** Requires a signed bearer token whose subject maps to a registered user. */
export interface VerifiedTokenMode {
  kind: 'verified-token';
  keySet: SigningKeySource;
  issuer: string;
  audience: string;
  resolver: IdentityResolver;
}

export type AuthMode = DevBypassMode | VerifiedTokenMode;

export interface AuthGateOptions {
  log: LogCallback;
  /** Clock for token expiry checks. */
  now?: () => Date;
}

export class AuthConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthConfigError';
  }
}

/**
 * Canonical form of a request path: duplicate slashes collapsed, `.` and `..`
 * segments resolved, trailing slash removed.
 */
export function normalizePath(rawPath: string): string {
  const normalized = path.posix.normalize(rawPath.startsWith('/') ? rawPath : `/${rawPath}`);
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/** Paths that pass through without identity. Expects a normalized path. */
export function isExemptPath(normalizedPath: string): boolean {
  return normalizedPath === HEALTH_PATH || normalizedPath.startsWith(AUTH_PATH_PREFIX);
}

function assertMode(mode: AuthMode): void {
  if (mode.kind === 'dev-bypass') return;
  if (mode.kind !== 'verified-token') {
    throw new AuthConfigError('unknown auth mode');
  }
  if (!mode.keySet || typeof mode.keySet.getKey !== 'function') {
    throw new AuthConfigError('verified-token mode requires a key set');
  }
  if (!mode.resolver || typeof mode.resolver.resolveUserId !== 'function') {
    throw new AuthConfigError('verified-token mode requires an identity resolver');
  }
  if (!mode.issuer) {
    throw new AuthConfigError('verified-token mode requires an issuer');
  }
  if (!mode.audience) {
    throw new AuthConfigError('verified-token mode requires an audience');
  }
}

/**
 * Authentication gate.
 *
 * Exempt paths pass straight through. Everything else must establish an
 * internal user id, which is bound to the request context as `userId` before
 * the handler runs. Token failures all look the same to the client; only an
 * identity-resolution failure is logged.
 *
 * @throws AuthConfigError when a verified-token mode is missing a collaborator
 */
export function createAuthGate(mode: AuthMode, opts: AuthGateOptions) {
  assertMode(mode);

  return createMiddleware(async (c, next) => {
    if (isExemptPath(normalizePath(c.req.path))) {
      await next();
      return;
    }

    if (mode.kind === 'dev-bypass') {
      const userId = c.req.header(DEV_USER_HEADER);
      if (!userId) {
        return c.json(errorBody('UNAUTHORIZED', 'X-User-ID header required in dev mode'), 401);
      }
      c.set('userId', userId);
      await next();
      return;
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader) {
      return c.json(errorBody('UNAUTHORIZED', 'authorization header required'), 401);
    }
    if (!authHeader.startsWith(BEARER_PREFIX)) {
      return c.json(errorBody('UNAUTHORIZED', 'invalid authorization header format'), 401);
    }

    const result = await verifyAccessToken(authHeader.slice(BEARER_PREFIX.length), {
      keys: mode.keySet,
      issuer: mode.issuer,
      audience: mode.audience,
      now: opts.now,
    });
    if (!result.ok) {
      return c.json(errorBody('UNAUTHORIZED', INVALID_TOKEN), 401);
    }

    let userId: string;
    try {
      userId = await mode.resolver.resolveUserId(result.claims.subject);
    } catch (err) {
      if (err instanceof IdentityNotFoundError) {
        return c.json(errorBody('UNAUTHORIZED', INVALID_TOKEN), 401);
      }
      opts.log('error', {
        event: 'identity_resolution_failed',
        request_id: c.get('requestId') ?? '',
        message: err instanceof Error ? err.message : String(err),
      });
      return c.json(errorBody('INTERNAL_ERROR', 'internal server error'), 500);
    }

    c.set('userId', userId);
    await next();
  });
}

/** Internal user id bound by the auth gate. */
export function getUserId(c: Context): string {
  const userId = c.get('userId');
  if (!userId) {
    throw new Error('user id missing from request context');
  }
  return userId;
}

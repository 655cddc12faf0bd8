/**
 * Access-token verification pipeline.
 *
 * Steps run in order and the first failure wins:
 *   1. header: compact form, algorithm allow-list (RS256 only), key id present
 *   2. key lookup through the key-set cache
 *   3. signature
 *   4. claims: issuer, audience, expiry, not-before, subject
 *
 * Failures carry a machine-readable reason for tests and debugging. The HTTP
 * layer collapses every reason into the same generic rejection.
 */
import * as jose from 'jose';
import { z } from 'zod';
import { KeySetError } from './key-set-cache.js';
import type { SigningKey, SigningKeySource } from './key-set-cache.js';

/** The only signing algorithm accepted. "none", HMAC and EC tokens are rejected. */
export const ALLOWED_ALGORITHMS = ['RS256'] as const;

export type VerificationFailure =
  | 'malformed'
  | 'algorithm_not_allowed'
  | 'missing_key_id'
  | 'unknown_key'
  | 'invalid_signature'
  | 'invalid_claims'
  | 'issuer_mismatch'
  | 'audience_mismatch'
  | 'expired'
  | 'not_yet_valid'
  | 'missing_subject';

export interface VerifiedClaims {
  subject: string;
  issuer: string;
  /** The audience value that matched. */
  audience: string;
  expiresAt: Date;
  tokenUse?: string;
  keyId: string;
}

export type VerificationResult =
  | { ok: true; claims: VerifiedClaims }
  | { ok: false; reason: VerificationFailure };

export interface VerifyOptions {
  keys: SigningKeySource;
  issuer: string;
  audience: string;
  now?: () => Date;
}

export interface ExpectedClaims {
  issuer: string;
  audience: string;
  keyId: string;
}

type HeaderResult =
  | { ok: true; keyId: string; algorithm: string }
  | { ok: false; reason: VerificationFailure };

const ClaimsSchema = z.object({
  sub: z.string().optional(),
  iss: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: z.number().optional(),
  nbf: z.number().optional(),
  token_use: z.string().optional(),
});

function fail(reason: VerificationFailure): { ok: false; reason: VerificationFailure } {
  return { ok: false, reason };
}

function isAllowedAlgorithm(alg: string): boolean {
  return ALLOWED_ALGORITHMS.some((allowed) => allowed === alg);
}

/** Decode the protected header without trusting it, and pin the algorithm. */
export function readTokenHeader(token: string): HeaderResult {
  if (token.split('.').length !== 3) return fail('malformed');

  let header: jose.ProtectedHeaderParameters;
  try {
    header = jose.decodeProtectedHeader(token);
  } catch {
    return fail('malformed');
  }

  if (typeof header.alg !== 'string' || !isAllowedAlgorithm(header.alg)) {
    return fail('algorithm_not_allowed');
  }
  if (typeof header.kid !== 'string' || header.kid.length === 0) {
    return fail('missing_key_id');
  }
  return { ok: true, keyId: header.kid, algorithm: header.alg };
}

/** Verify the compact JWS signature. Returns the raw payload, or null if it does not verify. */
export async function verifySignature(token: string, key: SigningKey): Promise<Uint8Array | null> {
  try {
    const { payload } = await jose.compactVerify(token, key.publicKey, {
      algorithms: [...ALLOWED_ALGORITHMS],
    });
    return payload;
  } catch {
    return null;
  }
}

/** Validate registered claims against expected values. Zero clock tolerance. */
export function validateClaims(
  payload: Uint8Array,
  expected: ExpectedClaims,
  now: Date,
): VerificationResult {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(payload));
  } catch {
    return fail('invalid_claims');
  }

  const parsed = ClaimsSchema.safeParse(raw);
  if (!parsed.success) return fail('invalid_claims');
  const claims = parsed.data;

  if (claims.iss !== expected.issuer) return fail('issuer_mismatch');

  const audiences = typeof claims.aud === 'string' ? [claims.aud] : (claims.aud ?? []);
  if (!audiences.includes(expected.audience)) return fail('audience_mismatch');

  if (claims.exp === undefined) return fail('invalid_claims');
  const nowSec = Math.floor(now.getTime() / 1000);
  if (claims.exp <= nowSec) return fail('expired');
  if (claims.nbf !== undefined && claims.nbf > nowSec) return fail('not_yet_valid');

  if (!claims.sub) return fail('missing_subject');

  return {
    ok: true,
    claims: {
      subject: claims.sub,
      issuer: expected.issuer,
      audience: expected.audience,
      expiresAt: new Date(claims.exp * 1000),
      tokenUse: claims.token_use,
      keyId: expected.keyId,
    },
  };
}

/**
 * Full verification of a bearer token.
 *
 * Key-set errors (unknown kid, refresh not permitted, refresh failed) are a
 * verification failure. Anything else thrown by the key source propagates.
 */
export async function verifyAccessToken(token: string, opts: VerifyOptions): Promise<VerificationResult> {
  const header = readTokenHeader(token);
  if (!header.ok) return header;

  let key: SigningKey;
  try {
    key = await opts.keys.getKey(header.keyId);
  } catch (err) {
    if (err instanceof KeySetError) return fail('unknown_key');
    throw err;
  }

  const payload = await verifySignature(token, key);
  if (!payload) return fail('invalid_signature');

  const now = opts.now ? opts.now() : new Date();
  return validateClaims(payload, { issuer: opts.issuer, audience: opts.audience, keyId: header.keyId }, now);
}

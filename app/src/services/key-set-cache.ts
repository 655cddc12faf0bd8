/**
 * Key-Set Cache — in-memory map of RSA signing keys fetched from a
 * well-known JWKS endpoint.
 *
 * Lookups hit the current snapshot first. A miss may trigger one refresh,
 * but only when the last successful refresh is older than the cooldown
 * window; inside the window a miss fails immediately. Tokens carrying
 * fabricated `kid` values therefore cannot drive unbounded fetch traffic.
 *
 * The snapshot is an immutable map replaced wholesale on every successful
 * refresh, so readers never observe keys from two fetch generations.
 * Concurrent misses that are allowed to refresh share one in-flight fetch.
 */
import * as jose from 'jose';
import { z } from 'zod';
import type { LogCallback } from '../types.js';

export interface SigningKey {
  readonly keyId: string;
  readonly keyType: 'RSA';
  readonly modulus: Uint8Array;
  readonly exponent: Uint8Array;
  /** Imported public key, ready for signature verification. */
  readonly publicKey: jose.KeyLike | Uint8Array;
}

/** Anything that can hand out a signing key by key id. */
export interface SigningKeySource {
  getKey(keyId: string): Promise<SigningKey>;
}

export class KeySetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KeySetError';
  }
}

/** The key id is not in the key set (or a refresh was not permitted). */
export class KeyNotFoundError extends KeySetError {
  readonly keyId: string;

  constructor(keyId: string) {
    super(`key with kid "${keyId}" not found in key set`);
    this.name = 'KeyNotFoundError';
    this.keyId = keyId;
  }
}

/** The key set endpoint could not be fetched or returned an unusable body. */
export class KeySetRefreshError extends KeySetError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KeySetRefreshError';
  }
}

export const DEFAULT_REFRESH_COOLDOWN_MS = 5 * 60 * 1000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

const KeySetDocumentSchema = z.object({
  keys: z.array(z.unknown()),
});

const RsaJwkSchema = z.object({
  kty: z.literal('RSA'),
  kid: z.string().min(1),
  n: z.string().min(1),
  e: z.string().min(1),
});

export interface KeySetCacheOptions {
  /** Key set endpoint, e.g. https://issuer/.well-known/jwks.json */
  url: string;
  /** Minimum time between refreshes triggered by a miss. Default 5 minutes. */
  cooldownMs?: number;
  /** Per-fetch timeout. Default 10s. */
  timeoutMs?: number;
  /** Clock in epoch ms. */
  now?: () => number;
  log?: LogCallback;
}

export class KeySetCache implements SigningKeySource {
  private readonly url: string;
  private readonly cooldownMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly log: LogCallback | null;

  private keys: ReadonlyMap<string, SigningKey> = new Map();
  private lastFetchAt: number | null = null;
  private inflight: Promise<void> | null = null;

  constructor(opts: KeySetCacheOptions) {
    this.url = opts.url;
    this.cooldownMs = opts.cooldownMs ?? DEFAULT_REFRESH_COOLDOWN_MS;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? null;
  }

  /** Number of keys in the current snapshot. */
  get size(): number {
    return this.keys.size;
  }

  /** Epoch ms of the last successful refresh, or null before the first. */
  get lastRefreshAt(): number | null {
    return this.lastFetchAt;
  }

  /**
   * Look up a key by id, refreshing at most once per cooldown window on a miss.
   *
   * @throws KeyNotFoundError when the key is absent and no refresh is allowed,
   *   or still absent after the refresh
   * @throws KeySetRefreshError when the permitted refresh fails
   */
  async getKey(keyId: string): Promise<SigningKey> {
    const cached = this.keys.get(keyId);
    if (cached) return cached;

    if (!this.canRefresh()) {
      throw new KeyNotFoundError(keyId);
    }

    await this.refresh();

    const refreshed = this.keys.get(keyId);
    if (!refreshed) {
      throw new KeyNotFoundError(keyId);
    }
    return refreshed;
  }

  private canRefresh(): boolean {
    // A refresh already in flight is joined, never duplicated.
    if (this.inflight) return true;
    if (this.lastFetchAt === null) return true;
    return this.now() - this.lastFetchAt > this.cooldownMs;
  }

  private refresh(): Promise<void> {
    if (!this.inflight) {
      this.inflight = this.fetchKeySet().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async fetchKeySet(): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let entries: unknown[];
    try {
      let res: Response;
      try {
        res = await fetch(this.url, {
          headers: { accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (err) {
        throw new KeySetRefreshError(`failed to fetch key set: ${errorMessage(err)}`, { cause: err });
      }

      if (res.status !== 200) {
        // Release the connection; the body is never read.
        await res.body?.cancel();
        throw new KeySetRefreshError(`key set endpoint returned status ${res.status}`);
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new KeySetRefreshError(`failed to decode key set: ${errorMessage(err)}`, { cause: err });
      }

      const parsed = KeySetDocumentSchema.safeParse(body);
      if (!parsed.success) {
        throw new KeySetRefreshError('failed to decode key set: missing keys array');
      }
      entries = parsed.data.keys;
    } catch (err) {
      this.log?.('warn', {
        event: 'key_set_refresh_failed',
        message: errorMessage(err),
      });
      throw err;
    } finally {
      clearTimeout(timeout);
    }

    const next = new Map<string, SigningKey>();
    for (const entry of entries) {
      const key = await toSigningKey(entry);
      if (key) next.set(key.keyId, key);
    }

    this.keys = next;
    this.lastFetchAt = this.now();
    this.log?.('info', { event: 'key_set_refreshed', key_count: next.size });
  }
}

/** Convert one JWKS entry to a SigningKey; unsupported or malformed entries yield null. */
async function toSigningKey(entry: unknown): Promise<SigningKey | null> {
  const parsed = RsaJwkSchema.safeParse(entry);
  if (!parsed.success) return null;

  const { kid, n, e } = parsed.data;
  try {
    const publicKey = await jose.importJWK({ kty: 'RSA', n, e }, 'RS256');
    return {
      keyId: kid,
      keyType: 'RSA',
      modulus: jose.base64url.decode(n),
      exponent: jose.base64url.decode(e),
      publicKey,
    };
  } catch {
    return null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

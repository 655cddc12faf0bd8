import { buildConnectionString } from './db/client.js';
import { isLogLevel } from './middleware/logger.js';
import type { LogLevel } from './middleware/logger.js';

export const APP_ENVS = ['local', 'alpha', 'beta', 'prod'] as const;

export type AppEnv = (typeof APP_ENVS)[number];

export type AuthConfig =
  | { mode: 'dev-bypass' }
  | {
      mode: 'verified-token';
      issuer: string;
      audience: string;
      jwksUrl: string;
      /** Minimum interval between key-set refreshes triggered by an unknown kid. */
      jwksRefreshCooldownMs: number;
    };

export interface TodoConfig {
  port: number;
  appEnv: AppEnv;
  logLevel: LogLevel;
  databaseUrl: string;
  auth: AuthConfig;
}

function isAppEnv(value: string): value is AppEnv {
  return APP_ENVS.some((env) => env === value);
}

/** Environment lookup where an empty value counts as unset. */
function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

/** Issuer URL of a hosted Cognito user pool. */
export function cognitoIssuer(region: string, userPoolId: string): string {
  return `https://cognito-idp.${region}.amazonaws.com/${userPoolId}`;
}

function parsePort(raw: string): number {
  const port = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`invalid SERVER_PORT "${raw}": must be an integer between 1 and 65535`);
  }
  return port;
}

function parseCooldownSec(raw: string): number {
  const sec = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(sec) || sec < 1) {
    throw new Error(`invalid JWKS_REFRESH_COOLDOWN_SEC "${raw}": must be a positive integer`);
  }
  return sec;
}

/**
 * Environment variables:
 *
 * SERVER_PORT           (optional) — HTTP listen port; default 8080
 * APP_ENV               (optional) — local | alpha | beta | prod; default local
 * AUTH_DEV_MODE         (optional) — 'true' trusts X-User-ID instead of tokens; local only
 * LOG_LEVEL             (optional) — error | warn | info | debug; default info
 * DATABASE_URL          (optional) — PostgreSQL connection string; built from DB_* when unset
 * DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME, DB_SSLMODE
 *                       (optional) — defaults localhost, 5432, todo, todo, todo, disable
 * AUTH_ISSUER           (optional) — expected token issuer; derived from the Cognito pool when unset
 * AUTH_AUDIENCE         (optional) — expected token audience; default COGNITO_APP_CLIENT_ID
 * AUTH_JWKS_URL         (optional) — key set URL; default {issuer}/.well-known/jwks.json
 * COGNITO_REGION        (optional) — default ap-northeast-1
 * COGNITO_USER_POOL_ID  (optional) — user pool id used to derive the issuer
 * COGNITO_APP_CLIENT_ID (optional) — app client id used as the audience
 * JWKS_REFRESH_COOLDOWN_SEC (optional) — key-set refresh cooldown; default 300
 *
 * Issuer and audience are required unless AUTH_DEV_MODE is on.
 */
export function loadConfig(): TodoConfig {
  const port = parsePort(env('SERVER_PORT') ?? '8080');

  const appEnvRaw = env('APP_ENV') ?? 'local';
  if (!isAppEnv(appEnvRaw)) {
    throw new Error(`invalid APP_ENV "${appEnvRaw}": must be one of ${APP_ENVS.join(', ')}`);
  }
  const appEnv = appEnvRaw;

  const logLevelRaw = (env('LOG_LEVEL') ?? 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(logLevelRaw) ? logLevelRaw : 'info';

  const databaseUrl = env('DATABASE_URL') ?? buildConnectionString({
    host: env('DB_HOST') ?? 'localhost',
    port: env('DB_PORT') ?? '5432',
    user: env('DB_USER') ?? 'todo',
    password: env('DB_PASSWORD') ?? 'todo',
    database: env('DB_NAME') ?? 'todo',
    sslmode: env('DB_SSLMODE') ?? 'disable',
  });

  const devMode = (env('AUTH_DEV_MODE') ?? 'false').toLowerCase() === 'true';
  if (devMode && appEnv !== 'local') {
    throw new Error(`AUTH_DEV_MODE must not be enabled in the ${appEnv} environment`);
  }

  let auth: AuthConfig;
  if (devMode) {
    auth = { mode: 'dev-bypass' };
  } else {
    const userPoolId = env('COGNITO_USER_POOL_ID');
    const issuer = env('AUTH_ISSUER')
      ?? (userPoolId ? cognitoIssuer(env('COGNITO_REGION') ?? 'ap-northeast-1', userPoolId) : undefined);
    if (!issuer) {
      throw new Error('AUTH_ISSUER or COGNITO_USER_POOL_ID is required when AUTH_DEV_MODE is off');
    }

    const audience = env('AUTH_AUDIENCE') ?? env('COGNITO_APP_CLIENT_ID');
    if (!audience) {
      throw new Error('AUTH_AUDIENCE or COGNITO_APP_CLIENT_ID is required when AUTH_DEV_MODE is off');
    }

    auth = {
      mode: 'verified-token',
      issuer,
      audience,
      jwksUrl: env('AUTH_JWKS_URL') ?? `${issuer.replace(/\/+$/, '')}/.well-known/jwks.json`,
      jwksRefreshCooldownMs: parseCooldownSec(env('JWKS_REFRESH_COOLDOWN_SEC') ?? '300') * 1000,
    };
  }

  return { port, appEnv, logLevel, databaseUrl, auth };
}

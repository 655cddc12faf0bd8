import pg from 'pg';
import type { LogCallback } from '../types.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export interface DbClientOptions {
  connectionString: string;
  /** Reported to the server as application_name. */
  applicationName?: string;
  /** Server-side statement_timeout; unset leaves the server default. */
  statementTimeoutMs?: number;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  log?: LogCallback;
}

/**
 * Create a PostgreSQL connection pool. No connection is opened until the
 * first query.
 */
export function createDbPool(opts: DbClientOptions): DbPool {
  const pool = new Pool({
    connectionString: opts.connectionString,
    application_name: opts.applicationName,
    statement_timeout: opts.statementTimeoutMs,
    max: opts.maxConnections ?? 10,
    idleTimeoutMillis: opts.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs ?? 5_000,
  });

  pool.on('error', (err) => {
    opts.log?.('error', {
      event: 'pg_pool_error',
      message: err.message,
    });
  });

  return pool;
}

export interface DsnParts {
  host: string;
  port: string;
  user: string;
  password: string;
  database: string;
  sslmode: string;
}

/** Build a postgres:// connection string from discrete settings. */
export function buildConnectionString(parts: DsnParts): string {
  const user = encodeURIComponent(parts.user);
  const password = encodeURIComponent(parts.password);
  const database = encodeURIComponent(parts.database);
  const sslmode = encodeURIComponent(parts.sslmode);
  return `postgres://${user}:${password}@${parts.host}:${parts.port}/${database}?sslmode=${sslmode}`;
}

/**
 * Graceful shutdown — drains all connections.
 */
export async function closeDbPool(pool: DbPool): Promise<void> {
  await pool.end();
}

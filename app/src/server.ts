import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { requestId } from './middleware/request-id.js';
import { createLogger } from './middleware/logger.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { createAuthGate } from './middleware/auth-gate.js';
import type { AuthMode } from './middleware/auth-gate.js';
import { createHealthRoutes } from './routes/health.js';
import { createTodoRoutes } from './routes/todos.js';
import { createDbPool, type DbPool } from './db/client.js';
import { PostgresTodoStore } from './db/pg-todo-store.js';
import { PostgresUserStore } from './db/pg-user-store.js';
import { KeySetCache } from './services/key-set-cache.js';
import type { SigningKeySource } from './services/key-set-cache.js';
import { createUserIdentityResolver } from './services/identity-resolver.js';
import type { IdentityResolver } from './services/identity-resolver.js';
import { TodoService } from './services/todo-service.js';
import { createErrorHandler, handleNotFound } from './utils/error-handler.js';
import type { TodoConfig } from './config.js';
import type { TodoStore } from './types/todo.js';
import type { LogCallback } from './types.js';

export const SERVICE_NAME = 'todo-api';

/** Collaborators that replace the PostgreSQL/JWKS-backed defaults. */
export interface TodoAppOverrides {
  todoStore?: TodoStore;
  identityResolver?: IdentityResolver;
  keySet?: SigningKeySource;
  /** Destination for log lines; defaults to stdout. */
  logWriter?: (line: string) => void;
}

export interface TodoApp {
  app: Hono;
  log: LogCallback;
  /** PostgreSQL pool (null when every store was supplied as an override) */
  dbPool: DbPool | null;
  /** Key-set cache (null in dev-bypass mode or when a key source was supplied) */
  keySetCache: KeySetCache | null;
}

/**
 * Create and configure the todo API Hono application.
 *
 * Middleware order: request id, security headers, body limit, request log,
 * auth gate. The logger wraps the gate so rejected requests are logged too.
 */
export function createTodoApp(config: TodoConfig, overrides: TodoAppOverrides = {}): TodoApp {
  const app = new Hono();
  const { middleware: loggerMiddleware, log } = createLogger(
    SERVICE_NAME,
    config.logLevel,
    overrides.logWriter,
  );

  const verified = config.auth.mode === 'verified-token';
  const needsDb = !overrides.todoStore || (verified && !overrides.identityResolver);

  let dbPool: DbPool | null = null;
  if (needsDb) {
    dbPool = createDbPool({ connectionString: config.databaseUrl, applicationName: SERVICE_NAME, log });
  }

  let keySetCache: KeySetCache | null = null;
  let authMode: AuthMode;
  if (config.auth.mode === 'verified-token') {
    let keySet = overrides.keySet;
    if (!keySet) {
      keySetCache = new KeySetCache({
        url: config.auth.jwksUrl,
        cooldownMs: config.auth.jwksRefreshCooldownMs,
        log,
      });
      keySet = keySetCache;
    }

    let resolver = overrides.identityResolver;
    if (!resolver) {
      if (!dbPool) throw new Error('identity resolver requires a database pool');
      resolver = createUserIdentityResolver(new PostgresUserStore(dbPool));
    }

    authMode = {
      kind: 'verified-token',
      keySet,
      issuer: config.auth.issuer,
      audience: config.auth.audience,
      resolver,
    };
  } else {
    log('warn', { event: 'auth_dev_mode', message: 'X-User-ID is trusted without verification' });
    authMode = { kind: 'dev-bypass' };
  }

  let todoStore = overrides.todoStore;
  if (!todoStore) {
    if (!dbPool) throw new Error('todo store requires a database pool');
    todoStore = new PostgresTodoStore(dbPool);
  }
  const todoService = new TodoService(todoStore);

  app.use('*', requestId());
  app.use('*', secureHeaders());
  app.use('*', createBodyLimit());
  app.use('*', loggerMiddleware);
  app.use('*', createAuthGate(authMode, { log }));

  app.route('/health', createHealthRoutes());
  app.route('/api/v1/todos', createTodoRoutes(todoService));

  app.onError(createErrorHandler(log));
  app.notFound(handleNotFound);

  return { app, log, dbPool, keySetCache };
}

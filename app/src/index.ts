import { serve } from '@hono/node-server';
import { createTodoApp, SERVICE_NAME } from './server.js';
import { loadConfig } from './config.js';
import { closeDbPool } from './db/client.js';

const config = loadConfig();

const { app, log, dbPool } = createTodoApp(config);

const server = serve(
  { fetch: app.fetch, port: config.port },
  (info) => {
    log('info', {
      event: 'server_started',
      message: `${SERVICE_NAME} listening on http://localhost:${info.port}`,
      app_env: config.appEnv,
      auth_mode: config.auth.mode,
    });
  },
);

let shuttingDown = false;
async function gracefulShutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log('info', { event: 'shutdown', signal });

  // Safety net: force exit if the event loop doesn't drain within 10s.
  // Unref'd so it doesn't keep the process alive.
  setTimeout(() => process.exit(1), 10_000).unref();

  server.close();

  if (dbPool) {
    try {
      await closeDbPool(dbPool);
    } catch (err) {
      log('error', {
        event: 'shutdown_pool_error',
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  log('info', { event: 'shutdown_complete' });
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

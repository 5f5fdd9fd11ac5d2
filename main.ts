import { serve } from '@hono/node-server';
import dotenv from 'dotenv';
import { createFetchHandler, createRouter } from './router';
import { log } from './handlers/logger';

dotenv.config();

/**
 * Sample target for local runs:
 *
 *   npm run target
 *   stability-probe --url=http://localhost:8000/health --duration=30 --interval=2 --expected=OK
 */
function main() {
  const PORT = process.env.PORT ? parseInt(process.env.PORT) : 8000;

  const app = createRouter({ requestLogging: true });

  const server = serve({
    fetch: createFetchHandler(app),
    port: PORT
  }, (info) => {
    log(`Target server running on http://localhost:${info.port}`, 'info');
  });

  const shutdown = () => {
    log('Target server shutting down', 'info');
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main();

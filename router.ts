import { Hono } from 'hono';
import { logger } from 'hono/logger';

export interface RouterOptions {
  requestLogging?: boolean;
}

/**
 * Minimal service under test: `/health` answers `OK`, everything else 404s.
 */
export function createRouter({ requestLogging = false }: RouterOptions = {}): Hono {
  const app = new Hono();

  if (requestLogging) {
    app.use('*', logger());
  }

  app.get('/health', (c) => c.text('OK'));

  app.notFound((c) => c.body(null, 404));

  return app;
}

/**
 * Fetch callback for `serve`. HEAD runs the matching GET route and answers with
 * its status and headers only, so the node adapter never sees a HEAD response
 * wrapped around a GET one.
 */
export function createFetchHandler(app: Hono): (request: Request) => Promise<Response> {
  return async (request) => {
    if (request.method !== 'HEAD') {
      return app.fetch(request);
    }

    const response = await app.fetch(new Request(request.url, { method: 'GET', headers: request.headers }));
    return new Response(null, { status: response.status, headers: response.headers });
  };
}

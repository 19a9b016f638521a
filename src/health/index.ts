import http from 'node:http';
import { Elysia } from 'elysia';
import * as Sentry from '@sentry/node';
import { HEALTH_RESPONSE_BODY } from '../lib/constants';
import type { Logger } from '../lib/logger';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown';
}

// Answers every method on every path with 200 "Healthy"
export function createHealthApp(log: Logger) {
  const respond = ({ request, path }: { request: Request; path: string }) => {
    log.debug({ method: request.method, path }, 'Health probe');
    return HEALTH_RESPONSE_BODY;
  };

  return new Elysia()
    .onError(({ code, error, path }) => {
      log.error({ code, path, error: errorMessage(error) }, 'Health responder error');
      Sentry.captureException(error, { tags: { component: 'health' } });
    })
    .all('/', respond)
    .all('/*', respond);
}

/**
 * Serves the health app on `port` for the lifetime of the process.
 *
 * Bind failures (port taken, permission denied) arrive asynchronously on the
 * server's `error` event; they are logged and reported, and polling carries on.
 */
export function startHealthServer(port: number, log: Logger): http.Server {
  const app = createHealthApp(log);

  const server = http.createServer(async (req, res) => {
    // Request bodies are never read
    req.resume();
    try {
      const response = await app.handle(
        new Request(`http://${req.headers.host ?? 'localhost'}${req.url ?? '/'}`, {
          method: req.method,
        })
      );
      response.headers.forEach((value, key) => res.setHeader(key, value));
      res.writeHead(response.status);
      res.end(await response.text());
    } catch (error) {
      log.error(
        { method: req.method, url: req.url, error: errorMessage(error) },
        'Health responder error'
      );
      Sentry.captureException(error, { tags: { component: 'health' } });
      res.writeHead(500);
      res.end();
    }
  });

  server.on('error', error => {
    log.error({ port, error: error.message }, 'Health responder failed to start');
    Sentry.captureException(error, { tags: { component: 'health' } });
  });

  server.on('listening', () => {
    const address = server.address();
    log.info(
      { port: address !== null && typeof address === 'object' ? address.port : port },
      'Health responder listening'
    );
  });

  server.listen(port);

  return server;
}

import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';
import { errorHandler, notFoundHandler } from '../middleware/error-handler.js';
import type { HttpConfig } from '../config/env.js';

export interface HealthPayload {
  status: 'ok';
  service: string;
}

/**
 * Liveness app. Answers from static data only, so it stays up whatever the
 * poll loop is doing.
 */
export function buildHealthApp(serviceName: string): ReturnType<typeof express> {
  const app = express();
  const payload: HealthPayload = { status: 'ok', service: serviceName };

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(morgan('combined', { skip: () => process.env['NODE_ENV'] === 'test' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.get('/', (_req, res) => {
    res.json(payload);
  });

  // ─── Fallbacks (must be last) ───────────────────────────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/** Bind the health app; resolves once the server is listening. */
export function startHealthServer(serviceName: string, http: HttpConfig): Promise<Server> {
  const server = createServer(buildHealthApp(serviceName));
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(http.port, http.host, () => {
      server.off('error', reject);
      server.on('error', (err) => console.error('[health] server error', err));
      console.log(`[health] listening on http://${http.host}:${http.port}`);
      resolve(server);
    });
  });
}

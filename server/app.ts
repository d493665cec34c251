/**
 * Express application factory
 *
 * Separated from server/index.ts so tests can mount the app on an ephemeral port.
 */

import express, { type Express } from 'express';
import { loggers } from './lib/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestIdMiddleware } from './middleware/requestId';
import { createApiRouter, type RouteDeps } from './routes';

const log = loggers.api;

export function createApp(deps: RouteDeps): Express {
  const app = express();

  app.use(requestIdMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      (req.logger ?? log).info(
        {
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - start,
        },
        `${req.method} ${req.path} ${res.statusCode}`
      );
    });
    next();
  });

  app.use('/api', createApiRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

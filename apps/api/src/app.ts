import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createApiRouter, ApiControllers, HealthReport } from './routes';
import { logger } from './utils/logger';

export function createApp(controllers: ApiControllers, health: () => HealthReport): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: true }));
  app.use(compression());
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`);
    next();
  });

  app.use('/api/v1', createApiRouter(controllers, health));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

import { Router } from 'express';
import { WorkshopController } from '../controllers/workshop.controller';
import { CollectionsController } from '../controllers/collections.controller';
import { AppSettingsController } from '../controllers/app-settings.controller';
import { LogsController } from '../controllers/logs.controller';
import { createWorkshopRouter } from './workshop.routes';
import { createCollectionsRouter } from './collections.routes';
import { createAppSettingsRouter } from './app-settings.routes';
import { createLogsRouter } from './logs.routes';

export interface ApiControllers {
  workshop: WorkshopController;
  collections: CollectionsController;
  settings: AppSettingsController;
  logs: LogsController;
}

export interface HealthReport {
  status: 'ok';
  workshopIds: number;
  modIds: number;
  collections: number;
  cachedPages: number;
}

export function createApiRouter(controllers: ApiControllers, health: () => HealthReport): Router {
  const router = Router();

  router.use('/workshop', createWorkshopRouter(controllers.workshop));
  router.use('/collections', createCollectionsRouter(controllers.collections));
  router.use('/settings', createAppSettingsRouter(controllers.settings));
  router.use('/logs', createLogsRouter(controllers.logs));

  // Health check
  router.get('/health', (_req, res) => {
    res.json(health());
  });

  return router;
}

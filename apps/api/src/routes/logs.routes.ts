import { Router } from 'express';
import { LogsController } from '../controllers/logs.controller';

export function createLogsRouter(controller: LogsController): Router {
  const router = Router();

  router.get('/', controller.getLogs);

  return router;
}

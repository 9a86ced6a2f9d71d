import { Router } from 'express';
import { WorkshopController } from '../controllers/workshop.controller';

export function createWorkshopRouter(controller: WorkshopController): Router {
  const router = Router();

  router.get('/items', controller.getItems);
  router.delete('/items', controller.removeItems);
  router.post('/items/refresh', controller.refreshAllItems);
  router.get('/items/:id', controller.getItem);
  router.post('/items/:id/refresh', controller.refreshItem);

  // One-line lists for the server config
  router.get('/ids', controller.getIdLines);

  router.post('/links', controller.addLinks);

  return router;
}

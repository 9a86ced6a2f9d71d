import { Router } from 'express';
import { CollectionsController } from '../controllers/collections.controller';

export function createCollectionsRouter(controller: CollectionsController): Router {
  const router = Router();

  router.get('/', controller.getCollections);
  router.post('/refresh', controller.refreshCollections);
  router.delete('/', controller.deleteCollections);

  return router;
}

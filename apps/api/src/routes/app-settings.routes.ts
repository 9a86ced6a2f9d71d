import { Router } from 'express';
import { AppSettingsController } from '../controllers/app-settings.controller';

export function createAppSettingsRouter(controller: AppSettingsController): Router {
  const router = Router();

  router.get('/', controller.getSettings);
  router.put('/', controller.updateSettings);
  router.post('/reset', controller.resetToDefaults);
  router.get('/defaults', controller.getDefaults);

  return router;
}

import { Request, Response, NextFunction } from 'express';
import type { AppSettingsService } from '../services/app-settings.service';
import { toServiceError } from '../middleware/errorHandler';
import { logger } from '../utils/logger';

export class AppSettingsController {
  constructor(private appSettings: AppSettingsService) {}

  /**
   * Get all application settings
   */
  getSettings = (req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json({
        success: true,
        settings: this.appSettings.getSettings(),
      });
    } catch (error) {
      next(toServiceError(error, 'Failed to get settings', 'settings'));
    }
  };

  /**
   * Update settings. Sections and keys left out keep their values.
   */
  updateSettings = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const settings = this.appSettings.updateSettings(req.body);

      logger.info('[AppSettingsController] Settings updated');
      res.json({
        success: true,
        settings,
      });
    } catch (error) {
      next(toServiceError(error, 'Failed to update settings', 'settings'));
    }
  };

  resetToDefaults = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const settings = this.appSettings.resetToDefaults();

      logger.info('[AppSettingsController] Settings reset to defaults');
      res.json({
        success: true,
        settings,
      });
    } catch (error) {
      next(toServiceError(error, 'Failed to reset settings', 'settings'));
    }
  };

  getDefaults = (req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json({
        success: true,
        defaults: this.appSettings.getDefaults(),
      });
    } catch (error) {
      next(toServiceError(error, 'Failed to get default settings', 'settings'));
    }
  };
}

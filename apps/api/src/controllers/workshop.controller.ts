import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppSettingsService } from '../services/app-settings.service';
import type { WorkshopService } from '../services/workshop.service';
import { ChoiceMapResolver } from '../services/mod-id-resolvers';
import { toServiceError } from '../middleware/errorHandler';
import { abortOnClose, getStringParam, parseWith } from '../utils/params';
import { logger } from '../utils/logger';

const idSchema = z.string().trim().regex(/^\d+$/, 'must be a numeric Workshop ID');

// Workshop ID -> chosen mod ID(s), or null to skip that item
export const modIdChoicesSchema = z
  .record(z.string(), z.union([z.string(), z.array(z.string()), z.null()]))
  .optional();

const addLinksSchema = z.object({
  urls: z.array(z.string().trim().min(1)).min(1),
  modIdChoices: modIdChoicesSchema,
});

const removeItemsSchema = z.object({
  ids: z.array(idSchema).min(1),
});

const listItemsSchema = z.object({
  view: z.enum(['mods', 'maps', 'all']).optional(),
  sort: z.enum(['name', 'build', 'tags', 'link', 'added']).optional(),
  order: z.enum(['asc', 'desc']).optional(),
  search: z.string().optional(),
});

export class WorkshopController {
  constructor(private workshop: WorkshopService, private settings: AppSettingsService) {}

  /**
   * List items. View and sort fall back to the UI defaults in Settings.json.
   */
  getItems = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const query = parseWith(listItemsSchema, req.query, 'query');
      const ui = this.settings.getUiSettings();
      const items = this.workshop.listItems({
        view: query.view ?? ui.defaultView,
        sort: query.sort ?? ui.defaultSort,
        order: query.order,
        search: query.search,
      });
      res.json({ total: items.length, items });
    } catch (error) {
      next(toServiceError(error, 'Failed to list Workshop items', 'workshop'));
    }
  };

  getItem = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const id = parseWith(idSchema, getStringParam(req.params.id), 'id');
      res.json(this.workshop.getItem(id));
    } catch (error) {
      next(toServiceError(error, 'Failed to fetch Workshop item', 'workshop'));
    }
  };

  getIdLines = (req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json(this.workshop.getIdLines());
    } catch (error) {
      next(toServiceError(error, 'Failed to build ID lines', 'workshop'));
    }
  };

  addLinks = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseWith(addLinksSchema, req.body, 'body');
      const results = await this.workshop.addLinks(body.urls, {
        resolver: new ChoiceMapResolver(body.modIdChoices),
        signal: abortOnClose(res),
      });
      logger.info(`[WorkshopController] Processed ${results.length} link(s)`);
      res.json({ results });
    } catch (error) {
      next(toServiceError(error, 'Failed to add Workshop links', 'workshop'));
    }
  };

  removeItems = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseWith(removeItemsSchema, req.body, 'body');
      res.json(await this.workshop.removeItems(body.ids));
    } catch (error) {
      next(toServiceError(error, 'Failed to remove Workshop items', 'workshop'));
    }
  };

  refreshItem = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = parseWith(idSchema, getStringParam(req.params.id), 'id');
      res.json(await this.workshop.refreshDetails(id, { signal: abortOnClose(res) }));
    } catch (error) {
      next(toServiceError(error, 'Failed to refresh Workshop item', 'workshop'));
    }
  };

  refreshAllItems = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.workshop.refreshAllDetails({ signal: abortOnClose(res) }));
    } catch (error) {
      next(toServiceError(error, 'Failed to refresh Workshop items', 'workshop'));
    }
  };
}

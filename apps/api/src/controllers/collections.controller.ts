import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { WorkshopService } from '../services/workshop.service';
import { ChoiceMapResolver } from '../services/mod-id-resolvers';
import { modIdChoicesSchema } from './workshop.controller';
import { toServiceError } from '../middleware/errorHandler';
import { abortOnClose, parseWith } from '../utils/params';

const refreshSchema = z.object({
  // Empty or missing means every tracked collection
  urls: z.array(z.string().trim().min(1)).optional(),
  modIdChoices: modIdChoicesSchema,
});

const deleteSchema = z.object({
  urls: z.array(z.string().trim().min(1)).min(1),
});

export class CollectionsController {
  constructor(private workshop: WorkshopService) {}

  getCollections = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const collections = this.workshop.listCollections();
      res.json({ total: collections.length, collections });
    } catch (error) {
      next(toServiceError(error, 'Failed to list collections', 'collections'));
    }
  };

  refreshCollections = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseWith(refreshSchema, req.body ?? {}, 'body');
      const results = await this.workshop.refreshCollections(body.urls ?? [], {
        resolver: new ChoiceMapResolver(body.modIdChoices),
        signal: abortOnClose(res),
      });
      res.json({ results });
    } catch (error) {
      next(toServiceError(error, 'Failed to refresh collections', 'collections'));
    }
  };

  deleteCollections = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseWith(deleteSchema, req.body, 'body');
      res.json({ results: await this.workshop.deleteCollections(body.urls) });
    } catch (error) {
      next(toServiceError(error, 'Failed to delete collections', 'collections'));
    }
  };
}

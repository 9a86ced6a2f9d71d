import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { getLogEntries } from '../utils/log-store';
import { toServiceError } from '../middleware/errorHandler';
import { parseWith } from '../utils/params';

const logQuerySchema = z.object({
  level: z.enum(['info', 'warn', 'error', 'debug']).optional(),
  page: z.coerce.number().int().positive().optional(),
  pageSize: z.coerce.number().int().positive().max(500).optional(),
});

export class LogsController {
  getLogs = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const query = parseWith(logQuerySchema, req.query, 'query');
      res.json(getLogEntries(query));
    } catch (error) {
      next(toServiceError(error, 'Failed to fetch logs', 'logs'));
    }
  };
}

import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import {
  FetchError,
  NotFoundError,
  OperationCancelledError,
  PageParseError,
  PersistenceError,
  ValidationError,
} from '../utils/errors';

export class ServiceError extends Error {
  constructor(
    message: string,
    public service: string,
    public statusCode: number = 500,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'ServiceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Wraps anything a controller caught. Errors that already carry a meaning
 * pass through so the handler below can map them to a status code.
 */
export function toServiceError(error: unknown, message: string, service: string): Error {
  if (
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof PersistenceError ||
    error instanceof FetchError ||
    error instanceof PageParseError ||
    error instanceof OperationCancelledError
  ) {
    return error;
  }
  return new ServiceError(message, service, 500, error);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ServiceError) {
    logger.error(`[${err.service}] ${err.message}`, err.originalError || err.stack);

    res.status(err.statusCode).json({
      error: {
        message: err.message,
        service: err.service,
        code: err.statusCode,
      },
    });
    return;
  }

  if (err instanceof ValidationError || err instanceof NotFoundError) {
    logger.warn(`${err.name}: ${err.message}`);

    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.statusCode,
      },
    });
    return;
  }

  if (err instanceof PersistenceError) {
    logger.error(`[Persistence] ${err.operation}: ${err.message}`, err.originalError);

    res.status(503).json({
      error: {
        message: err.message,
        code: 503,
        retryable: true,
      },
    });
    return;
  }

  if (err instanceof FetchError) {
    logger.warn(`[Steam] ${err.message} (${err.url})`);

    res.status(502).json({
      error: {
        message: err.message,
        url: err.url,
        code: 502,
      },
    });
    return;
  }

  if (err instanceof PageParseError) {
    logger.warn(`[Scraper] ${err.message} (${err.url})`);

    res.status(422).json({
      error: {
        message: err.message,
        url: err.url,
        code: 422,
      },
    });
    return;
  }

  if (err instanceof OperationCancelledError) {
    logger.info(err.message);

    res.status(409).json({
      error: {
        message: err.message,
        code: 409,
      },
    });
    return;
  }

  // Unhandled errors
  logger.error('Unhandled error:', err);

  res.status(500).json({
    error: {
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
      code: 500,
    },
  });
}

export function notFoundHandler(
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.path} not found`,
      code: 404,
    },
  });
}

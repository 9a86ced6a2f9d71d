import type { Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from './errors';

/**
 * Utility to safely extract string param from Express request params
 */
export function getStringParam(param: string | string[]): string {
  return Array.isArray(param) ? param[0] : param;
}

/**
 * Validates a request body or query against a schema, turning the first
 * issue into a 400.
 */
export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${what}.${issue.path.join('.')}` : what;
    throw new ValidationError(`Invalid ${where}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Aborts when the client goes away before the response is written, so long
 * scrapes stop instead of committing for nobody.
 */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { InvalidInputError, isOfficeError } from '../core/errors';
import { createErrorResponse, logAndRespond } from '../core/logger';
import { getSessionUser } from '../types/session';

const idSchema = z.coerce.number().int().positive();

export function parseId(value: string | undefined, name = 'id'): number {
  const parsed = idSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidInputError(`${name} must be a positive integer`, { [name]: value });
  }
  return parsed.data;
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const firstError = result.error.issues[0];
    const field = firstError.path.join('.');
    throw new InvalidInputError(
      field ? `${field}: ${firstError.message}` : firstError.message,
      { issues: result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) }
    );
  }
  return result.data;
}

/**
 * The acting employee id. Only call behind `isAuthenticated`.
 */
export function getActorId(req: Request): number {
  const user = getSessionUser(req);
  if (!user) {
    throw new InvalidInputError('No session user');
  }
  return user.id;
}

/**
 * Answers with the status and code of a domain failure; anything else is
 * logged with request context and answered with 500.
 */
export function respondWithError(req: Request, res: Response, error: unknown, message: string): void {
  if (isOfficeError(error)) {
    res.status(error.statusCode).json(createErrorResponse(req, error.message, error.code, error.details));
    return;
  }
  logAndRespond(req, res, 500, message, error, 'INTERNAL_ERROR');
}

export function withErrors(
  message: string,
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, _next: NextFunction) => {
    handler(req, res).catch((error: unknown) => respondWithError(req, res, error, message));
  };
}

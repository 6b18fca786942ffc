import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { OfficeStore } from '../core/store/types';
import { logger } from '../core/logger';
import { loginRateLimiter } from '../middleware/rateLimiting';
import { parseInput, withErrors } from './helpers';
import { ForbiddenError } from '../core/errors';

const loginSchema = z.object({
  employeeId: z.coerce.number().int().positive(),
});

// Session issuance belongs to the authentication service; this router only
// exists so local runs can act as a seeded employee.
export function createDevAuthRouter(store: OfficeStore): Router {
  const router = Router();

  router.post('/api/dev/login', loginRateLimiter, withErrors('Failed to open session', async (req: Request, res: Response) => {
    const { employeeId } = parseInput(loginSchema, req.body);
    const employee = await store.findEmployee(employeeId);
    if (!employee || !employee.isActive) {
      throw new ForbiddenError('Unknown or inactive employee', { employeeId });
    }
    req.session.user = {
      id: employee.id,
      username: employee.username,
      name: employee.name,
      role: employee.role,
    };
    logger.info('[DevAuth] Session opened', { actorId: employee.id });
    res.json({ user: req.session.user });
  }));

  router.post('/api/dev/logout', (req: Request, res: Response) => {
    req.session.destroy((err: unknown) => {
      if (err) {
        logger.warn('[DevAuth] Session destroy failed', { error: err instanceof Error ? err : String(err) });
      }
      res.json({ ok: true });
    });
  });

  return router;
}

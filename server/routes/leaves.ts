import { Router } from 'express';
import { z } from 'zod';
import { LEAVE_TYPES } from '../../shared/constants/statuses';
import type { OfficeServices } from '../core/officeServices';
import { isAuthenticated } from '../core/session';
import { requestCreationRateLimiter } from '../middleware/rateLimiting';
import { getActorId, parseId, parseInput, withErrors } from './helpers';

export const createLeaveSchema = z.object({
  leaveType: z.enum(LEAVE_TYPES),
  startDate: z.string(),
  endDate: z.string(),
  reason: z.string().max(1000).nullable().optional(),
});

const rejectSchema = z.object({
  reason: z.string().max(500).nullable().optional(),
});

export function createLeaveRouter(services: OfficeServices): Router {
  const router = Router();

  router.post('/api/leaves', isAuthenticated, requestCreationRateLimiter, withErrors('Failed to create leave request', async (req, res) => {
    const body = parseInput(createLeaveSchema, req.body);
    res.status(201).json(await services.leaves.create(getActorId(req), body));
  }));

  router.get('/api/leaves', isAuthenticated, withErrors('Failed to fetch leave requests', async (req, res) => {
    res.json(await services.leaves.listMine(getActorId(req)));
  }));

  router.get('/api/leaves/pending', isAuthenticated, withErrors('Failed to fetch pending leave requests', async (req, res) => {
    res.json(await services.leaves.listPendingForApprover(getActorId(req)));
  }));

  router.put('/api/leaves/:id/approve', isAuthenticated, withErrors('Failed to approve leave request', async (req, res) => {
    res.json(await services.leaves.approve(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/leaves/:id/reject', isAuthenticated, withErrors('Failed to reject leave request', async (req, res) => {
    const leaveId = parseId(req.params.id);
    const { reason } = parseInput(rejectSchema, req.body);
    res.json(await services.leaves.reject(getActorId(req), leaveId, reason));
  }));

  router.put('/api/leaves/:id/cancel', isAuthenticated, withErrors('Failed to cancel leave request', async (req, res) => {
    res.json(await services.leaves.cancel(getActorId(req), parseId(req.params.id)));
  }));

  return router;
}

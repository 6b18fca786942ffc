import { Router } from 'express';
import { z } from 'zod';
import type { OfficeServices } from '../core/officeServices';
import { isAuthenticated } from '../core/session';
import { requestCreationRateLimiter } from '../middleware/rateLimiting';
import { getActorId, parseId, parseInput, withErrors } from './helpers';

const createRequestSchema = z.object({
  deviceId: z.coerce.number().int().positive(),
});

const rejectSchema = z.object({
  reason: z.string().max(500).nullable().optional(),
});

export function createDeviceRequestRouter(services: OfficeServices): Router {
  const router = Router();
  const requests = services.deviceRequests;

  router.post('/api/device-requests', isAuthenticated, requestCreationRateLimiter, withErrors('Failed to create device request', async (req, res) => {
    const { deviceId } = parseInput(createRequestSchema, req.body);
    res.status(201).json(await requests.create(getActorId(req), deviceId));
  }));

  router.get('/api/device-requests', isAuthenticated, withErrors('Failed to fetch device requests', async (req, res) => {
    res.json(await requests.listMine(getActorId(req)));
  }));

  router.get('/api/device-requests/pending', isAuthenticated, withErrors('Failed to fetch pending device requests', async (req, res) => {
    res.json(await requests.listPending(getActorId(req)));
  }));

  router.get('/api/device-requests/return-pending', isAuthenticated, withErrors('Failed to fetch pending returns', async (req, res) => {
    res.json(await requests.listReturnPending(getActorId(req)));
  }));

  router.put('/api/device-requests/:id/approve', isAuthenticated, withErrors('Failed to approve device request', async (req, res) => {
    res.json(await requests.approve(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/device-requests/:id/reject', isAuthenticated, withErrors('Failed to reject device request', async (req, res) => {
    const requestId = parseId(req.params.id);
    const { reason } = parseInput(rejectSchema, req.body);
    res.json(await requests.reject(getActorId(req), requestId, reason));
  }));

  router.put('/api/device-requests/:id/collect', isAuthenticated, withErrors('Failed to collect device', async (req, res) => {
    res.json(await requests.collect(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/device-requests/:id/return', isAuthenticated, withErrors('Failed to start device return', async (req, res) => {
    res.json(await requests.initiateReturn(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/device-requests/:id/confirm-return', isAuthenticated, withErrors('Failed to confirm device return', async (req, res) => {
    res.json(await requests.confirmReturn(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/device-requests/:id/cancel', isAuthenticated, withErrors('Failed to cancel device request', async (req, res) => {
    res.json(await requests.cancel(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/device-requests/:id/admin-cancel', isAuthenticated, withErrors('Failed to cancel device request', async (req, res) => {
    res.json(await requests.adminCancel(getActorId(req), parseId(req.params.id)));
  }));

  return router;
}

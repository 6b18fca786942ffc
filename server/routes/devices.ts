import { Router } from 'express';
import { z } from 'zod';
import type { OfficeServices } from '../core/officeServices';
import { isAuthenticated } from '../core/session';
import { getActorId, parseId, parseInput, withErrors } from './helpers';

const deviceBodySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  type: z.string().trim().max(50).nullable().optional(),
  description: z.string().max(2000).nullable().optional(),
});

const deviceUpdateSchema = deviceBodySchema.partial().refine(
  body => Object.keys(body).length > 0,
  'At least one field is required'
);

export function createDeviceRouter(services: OfficeServices): Router {
  const router = Router();

  router.get('/api/devices', isAuthenticated, withErrors('Failed to fetch devices', async (req, res) => {
    res.json(await services.devices.list(getActorId(req)));
  }));

  router.get('/api/devices/available', isAuthenticated, withErrors('Failed to fetch available devices', async (req, res) => {
    res.json(await services.devices.listAvailable(getActorId(req)));
  }));

  router.get('/api/devices/:id', isAuthenticated, withErrors('Failed to fetch device', async (req, res) => {
    res.json(await services.devices.get(getActorId(req), parseId(req.params.id)));
  }));

  router.post('/api/devices', isAuthenticated, withErrors('Failed to create device', async (req, res) => {
    const body = parseInput(deviceBodySchema, req.body);
    res.status(201).json(await services.devices.create(getActorId(req), body));
  }));

  router.put('/api/devices/:id', isAuthenticated, withErrors('Failed to update device', async (req, res) => {
    const deviceId = parseId(req.params.id);
    const body = parseInput(deviceUpdateSchema, req.body);
    res.json(await services.devices.update(getActorId(req), deviceId, body));
  }));

  router.delete('/api/devices/:id', isAuthenticated, withErrors('Failed to retire device', async (req, res) => {
    res.json(await services.devices.retire(getActorId(req), parseId(req.params.id)));
  }));

  return router;
}

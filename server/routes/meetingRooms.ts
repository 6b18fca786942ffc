import { Router } from 'express';
import { z } from 'zod';
import type { OfficeServices } from '../core/officeServices';
import { isAuthenticated } from '../core/session';
import { getActorId, parseId, parseInput, withErrors } from './helpers';

const roomBodySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  capacity: z.coerce.number().int().min(1),
  location: z.string().trim().max(200).nullable().optional(),
});

const roomUpdateSchema = roomBodySchema.partial().refine(
  body => Object.keys(body).length > 0,
  'At least one field is required'
);

const availabilityQuerySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
});

export function createMeetingRoomRouter(services: OfficeServices): Router {
  const router = Router();

  router.get('/api/meeting-rooms', isAuthenticated, withErrors('Failed to fetch meeting rooms', async (req, res) => {
    res.json(await services.rooms.list(getActorId(req)));
  }));

  router.get('/api/meeting-rooms/:id', isAuthenticated, withErrors('Failed to fetch meeting room', async (req, res) => {
    res.json(await services.rooms.get(getActorId(req), parseId(req.params.id)));
  }));

  router.get('/api/meeting-rooms/:id/availability', isAuthenticated, withErrors('Failed to fetch room availability', async (req, res) => {
    const roomId = parseId(req.params.id);
    const { date } = parseInput(availabilityQuerySchema, req.query);
    res.json(await services.bookings.availability(getActorId(req), roomId, date));
  }));

  router.post('/api/meeting-rooms', isAuthenticated, withErrors('Failed to create meeting room', async (req, res) => {
    const body = parseInput(roomBodySchema, req.body);
    res.status(201).json(await services.rooms.create(getActorId(req), body));
  }));

  router.put('/api/meeting-rooms/:id', isAuthenticated, withErrors('Failed to update meeting room', async (req, res) => {
    const roomId = parseId(req.params.id);
    const body = parseInput(roomUpdateSchema, req.body);
    res.json(await services.rooms.update(getActorId(req), roomId, body));
  }));

  router.delete('/api/meeting-rooms/:id', isAuthenticated, withErrors('Failed to retire meeting room', async (req, res) => {
    res.json(await services.rooms.retire(getActorId(req), parseId(req.params.id)));
  }));

  return router;
}

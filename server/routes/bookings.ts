import { Router } from 'express';
import { z } from 'zod';
import type { OfficeServices } from '../core/officeServices';
import { isAuthenticated } from '../core/session';
import { requestCreationRateLimiter } from '../middleware/rateLimiting';
import { getActorId, parseId, parseInput, withErrors } from './helpers';

const bookingBase = {
  roomId: z.coerce.number().int().positive(),
  title: z.string().trim().max(200).nullable().optional(),
};

// Either explicit instants, or a calendar date with HH:MM times in the office zone.
export const createBookingSchema = z.union([
  z.object({
    ...bookingBase,
    startAt: z.string().datetime({ offset: true }),
    endAt: z.string().datetime({ offset: true }),
  }),
  z.object({
    ...bookingBase,
    bookingDate: z.string(),
    startTime: z.string(),
    endTime: z.string(),
  }),
]);

export function createBookingRouter(services: OfficeServices): Router {
  const router = Router();

  router.post('/api/meeting-room-bookings', isAuthenticated, requestCreationRateLimiter, withErrors('Failed to create booking', async (req, res) => {
    const body = parseInput(createBookingSchema, req.body);
    res.status(201).json(await services.bookings.create(getActorId(req), body));
  }));

  router.get('/api/meeting-room-bookings', isAuthenticated, withErrors('Failed to fetch bookings', async (req, res) => {
    res.json(await services.bookings.listMine(getActorId(req)));
  }));

  router.put('/api/meeting-room-bookings/:id/complete', isAuthenticated, withErrors('Failed to complete booking', async (req, res) => {
    res.json(await services.bookings.complete(getActorId(req), parseId(req.params.id)));
  }));

  router.put('/api/meeting-room-bookings/:id/cancel', isAuthenticated, withErrors('Failed to cancel booking', async (req, res) => {
    res.json(await services.bookings.cancel(getActorId(req), parseId(req.params.id)));
  }));

  return router;
}

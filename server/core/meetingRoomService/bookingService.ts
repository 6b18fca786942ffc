import type { MeetingRoom, RoomBooking } from '../../../shared/schema';
import type { BookingStatus } from '../../../shared/constants/statuses';
import { assertOwner, resolveActiveActor } from '../approvalGate';
import { ConflictError, InvalidInputError, InvalidTransitionError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type { ServiceContext } from '../serviceContext';
import type { RoomBookingPatch } from '../store/types';
import { getDayWindow, isValidDateString } from '../../utils/dateUtils';
import { resolveBookingInterval, type BookingTimes } from './intervals';

export interface BookingServiceOptions {
  timeZone: string;
  /** Cap on an employee's confirmed bookings that have not ended; 0 turns it off. */
  maxActivePerEmployee: number;
}

export type CreateBookingInput = BookingTimes & {
  roomId: number;
  title?: string | null;
};

export interface RoomAvailability {
  room: MeetingRoom;
  date: string;
  timeZone: string;
  windowStart: Date;
  windowEnd: Date;
  bookings: RoomBooking[];
}

export class BookingService {
  constructor(
    private readonly ctx: ServiceContext,
    private readonly options: BookingServiceOptions
  ) {}

  async create(actorId: number, input: CreateBookingInput): Promise<RoomBooking> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    const interval = resolveBookingInterval(input, this.options.timeZone);
    const title = input.title?.trim() || null;
    const at = this.ctx.now();

    const booking = await this.ctx.store.transaction(async (tx) => {
      const room = await tx.findRoom(input.roomId, { forUpdate: true });
      if (!room || room.retiredAt) {
        throw new NotFoundError('Meeting room not found', { roomId: input.roomId });
      }

      if (this.options.maxActivePerEmployee > 0) {
        const upcoming = await tx.listBookings({ requesterId: actor.id, statuses: ['confirmed'], endingAfter: at });
        if (upcoming.length >= this.options.maxActivePerEmployee) {
          throw new ConflictError('Active booking limit reached', {
            limit: this.options.maxActivePerEmployee,
            active: upcoming.length,
          });
        }
      }

      const clash = await tx.findOverlappingBooking(input.roomId, interval.startAt, interval.endAt);
      if (clash) {
        throw new ConflictError('Time slot conflicts with an existing booking', {
          roomId: input.roomId,
          conflictingBookingId: clash.id,
          conflictStartAt: clash.startAt.toISOString(),
          conflictEndAt: clash.endAt.toISOString(),
        });
      }

      return tx.insertBooking({
        roomId: input.roomId,
        requesterId: actor.id,
        title,
        startAt: interval.startAt,
        endAt: interval.endAt,
      }, at);
    });

    logger.info('[Bookings] Booking created', {
      actorId: actor.id,
      roomId: booking.roomId,
      bookingId: booking.id,
      status: booking.status,
    });
    return booking;
  }

  cancel(actorId: number, bookingId: number): Promise<RoomBooking> {
    return this.finish(actorId, bookingId, 'cancelled', at => ({ cancelledAt: at }));
  }

  complete(actorId: number, bookingId: number): Promise<RoomBooking> {
    return this.finish(actorId, bookingId, 'completed', at => ({ completedAt: at }));
  }

  /**
   * Confirmed bookings that intersect the calendar day `date` in the office
   * time zone, earliest first.
   */
  async availability(actorId: number, roomId: number, date: string): Promise<RoomAvailability> {
    await resolveActiveActor(this.ctx.directory, actorId);
    if (!isValidDateString(date)) {
      throw new InvalidInputError('date must be YYYY-MM-DD', { date });
    }
    const room = await this.ctx.store.findRoom(roomId);
    if (!room || room.retiredAt) {
      throw new NotFoundError('Meeting room not found', { roomId });
    }
    const window = getDayWindow(date, this.options.timeZone);
    const bookings = await this.ctx.store.listBookings({
      roomId,
      statuses: ['confirmed'],
      overlapping: window,
      order: 'asc',
    });
    return {
      room,
      date,
      timeZone: this.options.timeZone,
      windowStart: window.startAt,
      windowEnd: window.endAt,
      bookings,
    };
  }

  async listMine(actorId: number): Promise<RoomBooking[]> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    return this.ctx.store.listBookings({ requesterId: actor.id, order: 'desc' });
  }

  private async finish(
    actorId: number,
    bookingId: number,
    to: Extract<BookingStatus, 'cancelled' | 'completed'>,
    patch: (at: Date) => RoomBookingPatch
  ): Promise<RoomBooking> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    const at = this.ctx.now();

    const booking = await this.ctx.store.transaction(async (tx) => {
      const existing = await tx.findBooking(bookingId, { forUpdate: true });
      if (!existing) {
        throw new NotFoundError('Booking not found', { bookingId });
      }
      assertOwner(actor, existing.requesterId, 'booking');
      if (existing.status !== 'confirmed') {
        throw new InvalidTransitionError(`Cannot move a ${existing.status} booking to ${to}`, {
          bookingId,
          status: existing.status,
        });
      }
      const updated = await tx.transitionBooking(bookingId, { from: ['confirmed'], to, patch: patch(at), at });
      if (!updated) {
        throw new InvalidTransitionError('Booking changed concurrently', { bookingId });
      }
      return updated;
    });

    logger.info(`[Bookings] Booking ${to}`, {
      actorId: actor.id,
      roomId: booking.roomId,
      bookingId: booking.id,
      status: booking.status,
    });
    return booking;
  }
}

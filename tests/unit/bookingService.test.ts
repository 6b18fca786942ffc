import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../server/core/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import {
  ConflictError,
  ForbiddenError,
  InvalidInputError,
  InvalidIntervalError,
  InvalidTransitionError,
  NotFoundError,
} from '../../server/core/errors';
import type { MeetingRoom } from '../../shared/schema';
import { createOfficeFixture, type OfficeFixture } from './fixtures';

function at(hhmm: string, date = '2030-01-16'): string {
  return `${date}T${hhmm}:00.000Z`;
}

describe('Room Bookings - overlap rules', () => {
  let f: OfficeFixture;
  let room: MeetingRoom;

  beforeEach(async () => {
    f = createOfficeFixture();
    room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
  });

  it('treats back-to-back bookings as non-overlapping', async () => {
    const first = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    const second = await f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('11:00'), endAt: at('12:00') });
    expect(first.status).toBe('confirmed');
    expect(second.status).toBe('confirmed');
  });

  it('rejects a partly overlapping booking with the clashing slot', async () => {
    const first = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    const attempt = f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('10:30'), endAt: at('11:30') });
    await expect(attempt).rejects.toBeInstanceOf(ConflictError);
    await expect(attempt).rejects.toMatchObject({
      details: {
        roomId: room.id,
        conflictingBookingId: first.id,
        conflictStartAt: at('10:00'),
        conflictEndAt: at('11:00'),
      },
    });
  });

  it('rejects a booking nested inside another and accepts the next free slot', async () => {
    await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('09:00'), endAt: at('10:00') });
    await expect(
      f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('09:30'), endAt: at('09:45') })
    ).rejects.toBeInstanceOf(ConflictError);
    const next = await f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    expect(next.startAt).toEqual(new Date(at('10:00')));
  });

  it('allows the same slot in a different room', async () => {
    const other = await f.services.rooms.create(f.superAdmin.id, { name: 'Focus Room', capacity: 2 });
    await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    const booking = await f.services.bookings.create(f.bob.id, { roomId: other.id, startAt: at('10:00'), endAt: at('11:00') });
    expect(booking.roomId).toBe(other.id);
  });

  it('frees a slot once its booking is cancelled', async () => {
    const first = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    await f.services.bookings.cancel(f.alice.id, first.id);
    const replacement = await f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('10:15'), endAt: at('10:45') });
    expect(replacement.status).toBe('confirmed');
  });

  it('admits exactly one of two simultaneous bookings for the same slot', async () => {
    const results = await Promise.allSettled([
      f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('14:00'), endAt: at('15:00') }),
      f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('14:30'), endAt: at('15:30') }),
    ]);
    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
    const [failure] = results.filter(r => r.status === 'rejected');
    expect(failure.status === 'rejected' && failure.reason).toBeInstanceOf(ConflictError);
  });
});

describe('Room Bookings - input validation', () => {
  let f: OfficeFixture;
  let room: MeetingRoom;

  beforeEach(async () => {
    f = createOfficeFixture();
    room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
  });

  it('rejects an empty or inverted interval', async () => {
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('10:00') })
    ).rejects.toBeInstanceOf(InvalidIntervalError);
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('11:00'), endAt: at('10:00') })
    ).rejects.toBeInstanceOf(InvalidIntervalError);
  });

  it('checks the interval before looking the room up', async () => {
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: 999, startAt: at('11:00'), endAt: at('10:00') })
    ).rejects.toBeInstanceOf(InvalidIntervalError);
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: 999, startAt: at('10:00'), endAt: at('11:00') })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects unparseable timestamps', async () => {
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: 'tomorrow', endAt: at('10:00') })
    ).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('refuses bookings in a retired room', async () => {
    await f.services.rooms.retire(f.superAdmin.id, room.id);
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('stores a trimmed title and a blank one as null', async () => {
    const titled = await f.services.bookings.create(f.alice.id, { roomId: room.id, title: '  Sprint review ', startAt: at('10:00'), endAt: at('11:00') });
    const untitled = await f.services.bookings.create(f.alice.id, { roomId: room.id, title: '  ', startAt: at('11:00'), endAt: at('12:00') });
    expect(titled.title).toBe('Sprint review');
    expect(untitled.title).toBeNull();
  });
});

describe('Room Bookings - wall-clock form', () => {
  it('reads date and times in the office time zone', async () => {
    const f = createOfficeFixture({ timeZone: 'Asia/Kolkata' });
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
    const booking = await f.services.bookings.create(f.alice.id, {
      roomId: room.id,
      bookingDate: '2030-01-16',
      startTime: '09:00',
      endTime: '10:00',
    });
    expect(booking.startAt.toISOString()).toBe('2030-01-16T03:30:00.000Z');
    expect(booking.endAt.toISOString()).toBe('2030-01-16T04:30:00.000Z');
  });

  it('places a slot skipped by spring-forward after the gap', async () => {
    const f = createOfficeFixture({ timeZone: 'America/New_York' });
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
    const early = await f.services.bookings.create(f.bob.id, {
      roomId: room.id,
      bookingDate: '2030-03-10',
      startTime: '01:00',
      endTime: '01:30',
    });
    const skipped = await f.services.bookings.create(f.alice.id, {
      roomId: room.id,
      bookingDate: '2030-03-10',
      startTime: '02:00',
      endTime: '02:30',
    });
    expect(early.startAt.toISOString()).toBe('2030-03-10T06:00:00.000Z');
    expect(skipped.startAt.toISOString()).toBe('2030-03-10T07:00:00.000Z');
    expect(skipped.endAt.toISOString()).toBe('2030-03-10T07:30:00.000Z');
  });

  it('rejects a malformed wall-clock time', async () => {
    const f = createOfficeFixture();
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: room.id, bookingDate: '2030-01-16', startTime: '9am', endTime: '10:00' })
    ).rejects.toBeInstanceOf(InvalidInputError);
    await expect(
      f.services.bookings.create(f.alice.id, { roomId: room.id, bookingDate: '2030-02-30', startTime: '09:00', endTime: '10:00' })
    ).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('Room Bookings - cancel and complete', () => {
  let f: OfficeFixture;
  let room: MeetingRoom;

  beforeEach(async () => {
    f = createOfficeFixture();
    room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
  });

  it('lets only the booker cancel', async () => {
    const booking = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    await expect(f.services.bookings.cancel(f.bob.id, booking.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(f.services.bookings.cancel(f.superAdmin.id, booking.id)).rejects.toBeInstanceOf(ForbiddenError);

    f.clock.advanceMinutes(30);
    const cancelled = await f.services.bookings.cancel(f.alice.id, booking.id);
    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.cancelledAt).toEqual(new Date('2030-01-15T08:30:00.000Z'));
  });

  it('completes a confirmed booking once', async () => {
    const booking = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    const completed = await f.services.bookings.complete(f.alice.id, booking.id);
    expect(completed.status).toBe('completed');
    await expect(f.services.bookings.complete(f.alice.id, booking.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(f.services.bookings.cancel(f.alice.id, booking.id)).rejects.toThrow('Cannot move a completed booking to cancelled');
  });

  it('keeps a cancelled booking cancelled', async () => {
    const booking = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    await f.services.bookings.cancel(f.alice.id, booking.id);
    await expect(f.services.bookings.complete(f.alice.id, booking.id)).rejects.toThrow('Cannot move a cancelled booking to completed');
    await expect(f.services.bookings.cancel(f.alice.id, booking.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    const [stored] = await f.services.bookings.listMine(f.alice.id);
    expect(stored).toMatchObject({ id: booking.id, status: 'cancelled' });
  });

  it('reports an unknown booking as not found', async () => {
    await expect(f.services.bookings.cancel(f.alice.id, 404)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists my bookings latest first', async () => {
    const early = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('08:00'), endAt: at('09:00') });
    const late = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('15:00'), endAt: at('16:00') });
    await f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('12:00'), endAt: at('13:00') });
    const mine = await f.services.bookings.listMine(f.alice.id);
    expect(mine.map(b => b.id)).toEqual([late.id, early.id]);
  });
});

describe('Room Bookings - active booking cap', () => {
  it('refuses a booking past the cap until one is released', async () => {
    const f = createOfficeFixture({ maxActiveBookingsPerEmployee: 2 });
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });

    const first = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('09:00'), endAt: at('10:00') });
    await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('10:00'), endAt: at('11:00') });
    const attempt = f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('11:00'), endAt: at('12:00') });
    await expect(attempt).rejects.toThrow('Active booking limit reached');
    await expect(attempt).rejects.toMatchObject({ details: { limit: 2, active: 2 } });

    const bobs = await f.services.bookings.create(f.bob.id, { roomId: room.id, startAt: at('11:00'), endAt: at('12:00') });
    expect(bobs.status).toBe('confirmed');

    await f.services.bookings.cancel(f.alice.id, first.id);
    const again = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('12:00'), endAt: at('13:00') });
    expect(again.status).toBe('confirmed');
  });

  it('does not count bookings that have already ended', async () => {
    const f = createOfficeFixture({ maxActiveBookingsPerEmployee: 1 });
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
    await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('09:00'), endAt: at('10:00') });

    f.clock.set(at('10:00'));
    const next = await f.services.bookings.create(f.alice.id, { roomId: room.id, startAt: at('14:00'), endAt: at('15:00') });
    expect(next.status).toBe('confirmed');
  });
});

describe('Room Bookings - daily availability', () => {
  it('returns the confirmed bookings touching the office-zone day, earliest first', async () => {
    const f = createOfficeFixture({ timeZone: 'America/New_York' });
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
    const other = await f.services.rooms.create(f.superAdmin.id, { name: 'Focus Room', capacity: 2 });
    const book = (roomId: number, startAt: string, endAt: string) =>
      f.services.bookings.create(f.alice.id, { roomId, startAt, endAt });

    // 23:00-00:00 local on the previous day
    await book(room.id, '2030-01-16T04:00:00.000Z', '2030-01-16T05:00:00.000Z');
    const straddling = await book(room.id, '2030-01-17T04:30:00.000Z', '2030-01-17T05:30:00.000Z');
    const morning = await book(room.id, '2030-01-16T14:00:00.000Z', '2030-01-16T15:00:00.000Z');
    const cancelled = await book(room.id, '2030-01-16T16:00:00.000Z', '2030-01-16T17:00:00.000Z');
    await f.services.bookings.cancel(f.alice.id, cancelled.id);
    await book(other.id, '2030-01-16T14:00:00.000Z', '2030-01-16T15:00:00.000Z');

    const result = await f.services.bookings.availability(f.bob.id, room.id, '2030-01-16');
    expect(result.room).toMatchObject({ id: room.id, name: 'Board Room', capacity: 10 });
    expect(result.timeZone).toBe('America/New_York');
    expect(result.windowStart.toISOString()).toBe('2030-01-16T05:00:00.000Z');
    expect(result.windowEnd.toISOString()).toBe('2030-01-17T05:00:00.000Z');
    expect(result.bookings.map(b => b.id)).toEqual([morning.id, straddling.id]);
  });

  it('rejects a malformed date and an unknown room', async () => {
    const f = createOfficeFixture();
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 10 });
    await expect(f.services.bookings.availability(f.alice.id, room.id, '16/01/2030')).rejects.toBeInstanceOf(InvalidInputError);
    await expect(f.services.bookings.availability(f.alice.id, 404, '2030-01-16')).rejects.toBeInstanceOf(NotFoundError);
  });
});

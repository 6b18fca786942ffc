import { InvalidInputError, InvalidIntervalError } from '../errors';
import { createZonedDate, isValidDateString, isValidTimeString } from '../../utils/dateUtils';

/** Half-open [startAt, endAt). */
export interface Interval {
  startAt: Date;
  endAt: Date;
}

export interface InstantTimes {
  startAt: Date | string;
  endAt: Date | string;
}

// Wall-clock form, read in the office time zone.
export interface CalendarTimes {
  bookingDate: string;
  startTime: string;
  endTime: string;
}

export type BookingTimes = InstantTimes | CalendarTimes;

/**
 * Touching intervals do not overlap: [10:00, 11:00) and [11:00, 12:00) are disjoint.
 */
export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return a.startAt.getTime() < b.endAt.getTime() && b.startAt.getTime() < a.endAt.getTime();
}

export function assertValidInterval(interval: Interval): Interval {
  if (interval.endAt.getTime() <= interval.startAt.getTime()) {
    throw new InvalidIntervalError('End time must be after start time', {
      startAt: interval.startAt.toISOString(),
      endAt: interval.endAt.toISOString(),
    });
  }
  return interval;
}

function toInstant(value: Date | string, field: string): Date {
  const instant = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(instant.getTime())) {
    throw new InvalidInputError(`${field} is not a valid timestamp`, { [field]: String(value) });
  }
  return instant;
}

function isCalendarTimes(times: BookingTimes): times is CalendarTimes {
  return 'bookingDate' in times;
}

/**
 * Turns either accepted time form into a validated interval.
 * Unparseable values fail as InvalidInput; an empty or inverted interval as InvalidInterval.
 */
export function resolveBookingInterval(times: BookingTimes, timeZone: string): Interval {
  if (!isCalendarTimes(times)) {
    return assertValidInterval({
      startAt: toInstant(times.startAt, 'startAt'),
      endAt: toInstant(times.endAt, 'endAt'),
    });
  }

  if (!isValidDateString(times.bookingDate)) {
    throw new InvalidInputError('bookingDate must be YYYY-MM-DD', { bookingDate: times.bookingDate });
  }
  if (!isValidTimeString(times.startTime) || !isValidTimeString(times.endTime)) {
    throw new InvalidInputError('startTime and endTime must be HH:MM', {
      startTime: times.startTime,
      endTime: times.endTime,
    });
  }
  return assertValidInterval({
    startAt: createZonedDate(times.bookingDate, times.startTime, timeZone),
    endAt: createZonedDate(times.bookingDate, times.endTime, timeZone),
  });
}

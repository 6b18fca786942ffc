/**
 * Office time zone utilities.
 *
 * Calendar dates (YYYY-MM-DD) and wall-clock times (HH:MM) are always read in
 * the office time zone. Instants are plain `Date` values.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

interface DateParts {
  year: number;
  month: number;
  day: number;
}

function parseDateParts(dateStr: string): DateParts | null {
  const match = DATE_PATTERN.exec(dateStr);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const roundTrip = new Date(Date.UTC(year, month - 1, day));
  if (roundTrip.getUTCFullYear() !== year || roundTrip.getUTCMonth() !== month - 1 || roundTrip.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

/**
 * True for a real calendar date in YYYY-MM-DD form ("2024-02-30" is not).
 */
export function isValidDateString(dateStr: string): boolean {
  return parseDateParts(dateStr) !== null;
}

/**
 * True for HH:MM or HH:MM:SS on a 24-hour clock.
 */
export function isValidTimeString(timeStr: string): boolean {
  return TIME_PATTERN.test(timeStr);
}

/**
 * Add days to a YYYY-MM-DD date string, returning a new YYYY-MM-DD string
 */
export function addDaysToDate(dateStr: string, days: number): string {
  const [year, month, day] = dateStr.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day + days));
  return date.toISOString().split('T')[0];
}

/**
 * Offset of `timeZone` from UTC at `instant`, in minutes (east positive).
 * Reads the "GMT", "GMT-8" or "GMT+5:30" forms Intl produces.
 */
export function getZoneOffsetMinutes(instant: Date, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    timeZoneName: 'shortOffset'
  });
  const offsetPart = formatter.formatToParts(instant).find(p => p.type === 'timeZoneName')?.value ?? 'GMT';
  const offsetMatch = offsetPart.match(/GMT([+-])(\d{1,2})(?::(\d{2}))?/);
  if (!offsetMatch) return 0;
  const sign = offsetMatch[1] === '-' ? -1 : 1;
  const hours = parseInt(offsetMatch[2], 10);
  const minutes = offsetMatch[3] ? parseInt(offsetMatch[3], 10) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * The instant at which the wall clock in `timeZone` reads `dateStr timeStr`.
 * The offset is taken at the target instant itself, so days with a DST change
 * resolve correctly. A wall time skipped by a spring-forward is read with the
 * pre-gap offset: 02:30 on a 02:00 to 03:00 jump becomes 03:30.
 */
export function createZonedDate(dateStr: string, timeStr: string, timeZone: string): Date {
  const dateParts = parseDateParts(dateStr);
  const timeMatch = TIME_PATTERN.exec(timeStr);
  if (!dateParts || !timeMatch) {
    throw new RangeError(`Invalid date or time: ${dateStr} ${timeStr}`);
  }
  const wallClockAsUtc = Date.UTC(
    dateParts.year,
    dateParts.month - 1,
    dateParts.day,
    Number(timeMatch[1]),
    Number(timeMatch[2]),
    timeMatch[3] ? Number(timeMatch[3]) : 0
  );

  const firstOffset = getZoneOffsetMinutes(new Date(wallClockAsUtc), timeZone);
  const settledOffset = getZoneOffsetMinutes(new Date(wallClockAsUtc - firstOffset * 60_000), timeZone);
  const candidate = new Date(wallClockAsUtc - settledOffset * 60_000);
  if (getZoneOffsetMinutes(candidate, timeZone) === settledOffset) {
    return candidate;
  }
  // No instant reads this wall time; the two offsets straddle the gap.
  return new Date(wallClockAsUtc - Math.min(firstOffset, settledOffset) * 60_000);
}

/**
 * The half-open window [date 00:00, next date 00:00) in `timeZone`.
 */
export function getDayWindow(dateStr: string, timeZone: string): { startAt: Date; endAt: Date } {
  return {
    startAt: createZonedDate(dateStr, '00:00', timeZone),
    endAt: createZonedDate(addDaysToDate(dateStr, 1), '00:00', timeZone),
  };
}

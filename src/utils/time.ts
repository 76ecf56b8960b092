const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

function zonedParts(instant: Date | number, timeZone: string): ZonedParts {
  const parts = getFormatter(timeZone).formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find(entry => entry.type === type);
    return part ? Number(part.value) : 0;
  };
  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second')
  };
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) {
    return false;
  }
  try {
    getFormatter(timeZone);
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/** Offset of the zone from UTC at the given instant, in milliseconds. */
export function timeZoneOffsetMs(instant: Date | number, timeZone: string): number {
  const epoch = typeof instant === 'number' ? instant : instant.getTime();
  const truncated = epoch - (((epoch % 1000) + 1000) % 1000);
  const parts = zonedParts(truncated, timeZone);
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return asUtc - truncated;
}

export function localDateKey(instant: Date | number, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  return formatDateKey(parts.year, parts.month, parts.day);
}

export function formatLocalClock(instant: Date | number, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  return `${pad(parts.hour)}:${pad(parts.minute)}`;
}

export function shiftDateKey(dateKey: string, days: number): string {
  const { year, month, day } = parseDateKey(dateKey);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return formatDateKey(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

export function parseDateKey(dateKey: string): { year: number; month: number; day: number } {
  const match = DATE_KEY_PATTERN.exec(dateKey);
  if (!match) {
    throw new Error(`Invalid date "${dateKey}" (expected YYYY-MM-DD)`);
  }
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

export function isClockTime(value: string): boolean {
  return CLOCK_PATTERN.test(value);
}

export function parseClock(value: string): { hour: number; minute: number } {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid time "${value}" (expected HH:MM)`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Converts a local wall-clock time on a calendar day to an instant. Times that
 * fall into a DST gap resolve forward by the size of the gap.
 */
export function zonedTimeToInstant(dateKey: string, clock: string, timeZone: string): Date {
  const { year, month, day } = parseDateKey(dateKey);
  const { hour, minute } = parseClock(clock);
  const guess = Date.UTC(year, month - 1, day, hour, minute);
  const firstOffset = timeZoneOffsetMs(guess, timeZone);
  let candidate = guess - firstOffset;
  const secondOffset = timeZoneOffsetMs(candidate, timeZone);
  if (secondOffset !== firstOffset) {
    candidate = guess - secondOffset;
  }
  return new Date(candidate);
}

function formatDateKey(year: number, month: number, day: number) {
  return `${String(year).padStart(4, '0')}-${pad(month)}-${pad(day)}`;
}

function pad(value: number) {
  return String(value).padStart(2, '0');
}

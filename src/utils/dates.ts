/**
 * Date and time utilities for the curtailment analysis
 *
 * All timestamps inside the analysis are local wall-clock times ("floating"
 * times). They are held as luxon DateTimes in the UTC zone so that hour
 * arithmetic never shifts across DST changes; the zone is only consulted when a
 * UTC source series is converted to local wall-clock time.
 */

import { DateTime, IANAZone } from 'luxon';
import { ValidationError } from './errors';

/** Canonical hour key, `yyyy-MM-dd HH:00` in local wall-clock time */
export type HourKey = string;

export const DEFAULT_LOCAL_TIMEZONE = 'Europe/Berlin';

// Day-first source format: DD.MM.YYYY HH:MM[:SS]
export const DAY_FIRST_FORMATS = ['dd.MM.yyyy HH:mm:ss', 'dd.MM.yyyy HH:mm'] as const;
export const CALENDAR_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

const HOUR_KEY_FORMAT = "yyyy-MM-dd HH':00'";
const FLOATING_ZONE = 'utc';

export type SourceTimestamp = string | number | null | undefined;

/**
 * Parse a day-first local timestamp. Returns null when the text does not match.
 */
export function parseDayFirstDateTime(value: SourceTimestamp): DateTime | null {
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!text) {
    return null;
  }

  for (const pattern of DAY_FIRST_FORMATS) {
    const parsed = DateTime.fromFormat(text, pattern, { zone: FLOATING_ZONE });
    if (parsed.isValid) {
      return parsed;
    }
  }

  return null;
}

/**
 * Parse a UTC timestamp (ISO-8601 or day-first) and convert it to local
 * wall-clock time in the given zone.
 */
export function parseUtcToLocal(value: SourceTimestamp, timezone: string = DEFAULT_LOCAL_TIMEZONE): DateTime | null {
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!text) {
    return null;
  }

  let utc = parseDayFirstDateTime(text);
  if (!utc) {
    const iso = DateTime.fromISO(text.replace(' ', 'T'), { zone: FLOATING_ZONE });
    utc = iso.isValid ? iso : null;
  }
  if (!utc) {
    return null;
  }

  return utc.setZone(timezone).setZone(FLOATING_ZONE, { keepLocalTime: true });
}

export function isValidTimezone(timezone: string): boolean {
  return IANAZone.isValidZone(timezone);
}

/**
 * Key of the hour bucket containing the given wall-clock time
 */
export function toHourKey(time: DateTime): HourKey {
  return time.startOf('hour').toFormat(HOUR_KEY_FORMAT);
}

export function minutesBetween(start: DateTime, end: DateTime): number {
  return end.diff(start, 'minutes').minutes;
}

/**
 * Parse a calendar date in YYYY-MM-DD format as local midnight.
 * Throws ValidationError if invalid.
 */
export function parseCalendarDate(dateStr: string): DateTime {
  const parsed = CALENDAR_DATE_REGEX.test(dateStr)
    ? DateTime.fromFormat(dateStr, 'yyyy-MM-dd', { zone: FLOATING_ZONE })
    : null;

  if (!parsed || !parsed.isValid) {
    throw new ValidationError(`Invalid date format: '${dateStr}'. Expected format: YYYY-MM-DD`);
  }

  return parsed;
}

export function isValidCalendarDate(dateStr: string): boolean {
  return CALENDAR_DATE_REGEX.test(dateStr) && DateTime.fromFormat(dateStr, 'yyyy-MM-dd').isValid;
}

/**
 * Format a wall-clock time the way the source files write it
 */
export function formatDayFirst(time: DateTime): string {
  return time.toFormat('dd.MM.yyyy HH:mm');
}

/**
 * Date Normalizer
 *
 * Two input shapes are recognized: a calendar date (`YYYY-MM-DD`), which
 * makes a task all-day, and an ISO 8601 date-time, which makes it timed.
 * Date-times without an offset are taken as UTC.
 *
 * All-day dates are sent upstream as midnight UTC. TickTick's own
 * clients store all-day tasks at midnight in the task's time zone; this
 * server does not attempt that conversion, and reads every all-day
 * timestamp back as its UTC calendar date so writes and reads agree.
 */

import { InvalidDateFormatError, MalformedUpstreamRecordError } from '../types/errors.js';

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface ParsedDate {
  /** Milliseconds since the epoch */
  epochMs: number;
  /** True when the input had no time-of-day */
  dateOnly: boolean;
}

export interface UpstreamDate {
  timestamp: string;
  isAllDay: boolean;
}

function utcEpoch(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  ms = 0
): number | null {
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  date.setUTCHours(hour, minute, second, ms);
  return date.getTime();
}

function offsetMinutes(offset: string | undefined): number | null {
  if (offset === undefined || offset === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 14 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

/**
 * Parse either recognized shape; `null` when the value is neither
 */
export function parseDate(value: string): ParsedDate | null {
  const trimmed = value.trim();

  const dateMatch = DATE_ONLY.exec(trimmed);
  if (dateMatch) {
    const epochMs = utcEpoch(Number(dateMatch[1]), Number(dateMatch[2]), Number(dateMatch[3]));
    return epochMs === null ? null : { epochMs, dateOnly: true };
  }

  const match = DATE_TIME.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const local = utcEpoch(
    Number(year),
    Number(month),
    Number(day),
    Number(hour),
    Number(minute),
    second ? Number(second) : 0,
    millis
  );
  const shift = offsetMinutes(offset);
  if (local === null || shift === null) {
    return null;
  }

  return { epochMs: local - shift * 60 * 1000, dateOnly: false };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function calendarDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function clockTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Convert an agent date string to TickTick's `yyyy-MM-dd'T'HH:mm:ssZ` form
 *
 * @param field - Field name reported in InvalidDateFormat
 */
export function dateToUpstream(value: string, field: string): UpstreamDate {
  const parsed = parseDate(value);
  if (!parsed) {
    throw new InvalidDateFormatError(field, value);
  }

  const date = new Date(parsed.epochMs);
  return {
    timestamp: `${calendarDate(date)}T${clockTime(date)}+0000`,
    isAllDay: parsed.dateOnly,
  };
}

/**
 * Convert an upstream timestamp to what the agent sees: a calendar date
 * for all-day tasks, a UTC date-time otherwise.
 *
 * Timed values come back in one canonical form, `YYYY-MM-DDTHH:mm:ssZ`,
 * whatever form they were written in: `2025-03-15T09:00:00` reads back as
 * `2025-03-15T09:00:00Z`, and `2025-03-15T18:00:00+09:00` does too.
 * Fractional seconds are dropped.
 */
export function dateFromUpstream(timestamp: unknown, isAllDay: boolean): string | null {
  if (timestamp === undefined || timestamp === null || timestamp === '') {
    return null;
  }

  const parsed = typeof timestamp === 'string' ? parseDate(timestamp) : null;
  if (!parsed) {
    throw new MalformedUpstreamRecordError(
      `Unrecognized upstream timestamp ${JSON.stringify(timestamp)}`,
      { timestamp }
    );
  }

  const date = new Date(parsed.epochMs);
  if (isAllDay) {
    return calendarDate(date);
  }
  return `${calendarDate(date)}T${clockTime(date)}Z`;
}

/**
 * True when the string is a calendar date with no time-of-day
 */
export function isCalendarDate(value: string): boolean {
  return DATE_ONLY.test(value.trim());
}

/**
 * Parse a search bound. A calendar date covers its whole UTC day, so an
 * `end` bound lands on the day's last millisecond.
 */
export function parseDateBound(value: string, field: string, edge: 'start' | 'end'): Date {
  const parsed = parseDate(value);
  if (!parsed) {
    throw new InvalidDateFormatError(field, value);
  }
  if (parsed.dateOnly && edge === 'end') {
    return new Date(parsed.epochMs + MS_PER_DAY - 1);
  }
  return new Date(parsed.epochMs);
}

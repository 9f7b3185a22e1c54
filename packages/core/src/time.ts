/**
 * Tracker timestamp parsing and business-time arithmetic.
 *
 * Business time is deliberately coarse: every weekday touched by an
 * interval counts as a full 8-hour working day, no holiday calendar,
 * no clipping of the first and last day.
 */

import { ParseError } from './errors.js';
import type { TrackerTimestamp } from './types.js';

// ─── Constants ─────────────────────────────────────────────────────

export const HOURS_PER_BUSINESS_DAY = 8;

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

/**
 * `2024-01-15T09:00:00.000+0000` or `2024-01-15T09:00:00+0000`.
 * The offset may also be written `+00:00` or `Z`.
 */
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})$/;

// ─── Parsing ───────────────────────────────────────────────────────

/**
 * Parse a tracker timestamp, with or without fractional seconds.
 * Throws ParseError when neither layout matches.
 */
export function parseTrackerTimestamp(text: string): TrackerTimestamp {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    throw new ParseError(`Unrecognised timestamp: "${text}"`, text);
  }

  const [, y, mo, d, h, mi, s, fraction, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  if (hour > 23 || minute > 59 || second > 59) {
    throw new ParseError(`Time out of range: "${text}"`, text);
  }

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(wallClock);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new ParseError(`Date out of range: "${text}"`, text);
  }

  const offsetMinutes = parseOffset(offset);
  return {
    epochMs: wallClock - offsetMinutes * MS_PER_MINUTE,
    offsetMinutes,
  };
}

/** Wrap a Date as a timestamp in the given offset (UTC by default) */
export function fromDate(date: Date, offsetMinutes = 0): TrackerTimestamp {
  return { epochMs: date.getTime(), offsetMinutes };
}

function parseOffset(offset: string): number {
  if (offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

// ─── Calendar Helpers ──────────────────────────────────────────────

/** Days since 1970-01-01 of the timestamp's local calendar date */
function localDayNumber(ts: TrackerTimestamp): number {
  return Math.floor((ts.epochMs + ts.offsetMinutes * MS_PER_MINUTE) / MS_PER_DAY);
}

/** 1970-01-01 was a Thursday */
function isWeekday(dayNumber: number): boolean {
  const weekday = (((dayNumber + 4) % 7) + 7) % 7;
  return weekday !== 0 && weekday !== 6;
}

/** Count weekdays in the half-open day range [from, to) */
function countWeekdays(from: number, to: number): number {
  let count = 0;
  for (let day = from; day < to; day++) {
    if (isWeekday(day)) count++;
  }
  return count;
}

// ─── Business Time ─────────────────────────────────────────────────

/**
 * Business hours between two instants: weekdays from the start date to
 * the end date inclusive, times 8. Returns 0 when end precedes start.
 */
export function businessDuration(start: TrackerTimestamp, end: TrackerTimestamp): number {
  const startDay = localDayNumber(start);
  const endDay = localDayNumber(end);
  if (endDay < startDay) return 0;
  return countWeekdays(startDay, endDay + 1) * HOURS_PER_BUSINESS_DAY;
}

/**
 * Weekdays from the start date up to, but not including, today.
 * "Today" is taken in the start timestamp's offset.
 */
export function businessDaysSince(start: TrackerTimestamp, now: Date): number {
  const today = localDayNumber({ epochMs: now.getTime(), offsetMinutes: start.offsetMinutes });
  return countWeekdays(localDayNumber(start), today);
}

/** Derived conversion for call sites that report days instead of hours */
export function hoursToBusinessDays(hours: number): number {
  return hours / HOURS_PER_BUSINESS_DAY;
}

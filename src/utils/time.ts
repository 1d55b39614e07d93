/**
 * Timestamp Utilities
 * @module utils/time
 *
 * Parsing and formatting of naive UTC timestamps with microsecond precision.
 * `Date` only keeps milliseconds, so the extra three digits travel beside it.
 */

import type { Timestamp } from '../types/results.js';
import { InvalidTimestampError } from '../errors/index.js';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const EPOCH_MILLIS_PATTERN = /^\d+$/;

export const SUBMIT_TIME_FORMAT_MESSAGE =
  'Expected timestamp in milliseconds or datetime (in format YYYY-MM-DDTHH:MM:SS.ffffff)';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Canonical form of an instant given as epoch milliseconds plus the
 * sub-millisecond microseconds (0-999)
 */
function fromEpoch(epochMillis: number, extraMicros: number): Timestamp | null {
  const date = new Date(epochMillis);
  const year = date.getUTCFullYear();
  if (Number.isNaN(date.getTime()) || year < 0 || year > 9999) {
    return null;
  }
  const iso = `${pad(year, 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}T${pad(
    date.getUTCHours(),
    2
  )}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}.${pad(
    date.getUTCMilliseconds(),
    3
  )}${pad(extraMicros, 3)}`;
  return toTimestamp(iso);
}

function toTimestamp(canonical: string): Timestamp {
  return canonical as Timestamp;
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 date or datetime. Offsets are converted to UTC and
 * naive values are taken as UTC. Returns null for anything else.
 */
export function parseIsoTimestamp(input: string): Timestamp | null {
  const match = ISO_PATTERN.exec(input.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, offset] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? 0);
  const minute = Number(minuteText ?? 0);
  const second = Number(secondText ?? 0);
  const micros = Number((fraction ?? '').padEnd(6, '0').slice(0, 6));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, Math.floor(micros / 1000));
  if (local.getUTCDate() !== day || local.getUTCMonth() !== month - 1) {
    return null;
  }

  const epochMillis = local.getTime() - parseOffsetMinutes(offset) * 60_000;
  return fromEpoch(epochMillis, micros % 1000);
}

/**
 * Timestamp for epoch milliseconds, fractional milliseconds kept as microseconds
 */
export function fromEpochMillis(value: number): Timestamp | null {
  if (!Number.isFinite(value)) {
    return null;
  }
  const totalMicros = Math.round(value * 1000);
  const millis = Math.floor(totalMicros / 1000);
  return fromEpoch(millis, totalMicros - millis * 1000);
}

export function nowTimestamp(clock: () => Date = () => new Date()): Timestamp {
  const now = clock();
  return fromEpoch(now.getTime(), 0) ?? toTimestamp(now.toISOString().slice(0, 23) + '000');
}

/**
 * Normalize a submitted `submit_time`: epoch milliseconds as a number or a
 * string of digits, or an ISO-8601 datetime. Absent values mean now.
 *
 * @throws InvalidTimestampError for anything else
 */
export function parseSubmitTime(
  value: unknown,
  clock: () => Date = () => new Date()
): Timestamp {
  if (value === undefined || value === null) {
    return nowTimestamp(clock);
  }

  let parsed: Timestamp | null = null;
  if (typeof value === 'number') {
    parsed = fromEpochMillis(value);
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    parsed = EPOCH_MILLIS_PATTERN.test(trimmed)
      ? fromEpochMillis(Number(trimmed))
      : parseIsoTimestamp(trimmed);
  }

  if (parsed === null) {
    const message = `${SUBMIT_TIME_FORMAT_MESSAGE}, got '${String(value)}'`;
    throw new InvalidTimestampError('submit_time', message, value);
  }
  return parsed;
}

/**
 * Canonicalize a value read back from storage
 */
export function fromStoredTimestamp(value: string | Date): Timestamp | null {
  return value instanceof Date ? fromEpoch(value.getTime(), 0) : parseIsoTimestamp(value);
}

/**
 * Output form: microseconds are dropped when they are all zero
 */
export function formatTimestamp(timestamp: Timestamp): string {
  return timestamp.endsWith('.000000') ? timestamp.slice(0, 19) : timestamp;
}

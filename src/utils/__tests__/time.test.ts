/**
 * Timestamp utility tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatTimestamp,
  fromEpochMillis,
  fromStoredTimestamp,
  nowTimestamp,
  parseIsoTimestamp,
  parseSubmitTime,
} from '../time.js';
import { InvalidTimestampError } from '../../errors/index.js';

describe('parseIsoTimestamp', () => {
  it('should keep microseconds and drop a Z suffix', () => {
    expect(parseIsoTimestamp('2022-08-24T06:54:57.123456Z')).toBe('2022-08-24T06:54:57.123456');
  });

  it('should convert offsets to UTC', () => {
    expect(parseIsoTimestamp('2022-08-24T08:54:57+02:00')).toBe('2022-08-24T06:54:57.000000');
    expect(parseIsoTimestamp('2022-08-24T00:30:00-0130')).toBe('2022-08-24T02:00:00.000000');
  });

  it('should take naive values as UTC', () => {
    expect(parseIsoTimestamp('2022-08-24 06:54')).toBe('2022-08-24T06:54:00.000000');
  });

  it('should expand a date to midnight', () => {
    expect(parseIsoTimestamp('2022-08-24')).toBe('2022-08-24T00:00:00.000000');
  });

  it('should pad and truncate fractions to six digits', () => {
    expect(parseIsoTimestamp('2022-08-24T06:54:57.1')).toBe('2022-08-24T06:54:57.100000');
    expect(parseIsoTimestamp('2022-08-24T06:54:57.123456789')).toBe('2022-08-24T06:54:57.123456');
  });

  it('should reject impossible dates and free text', () => {
    expect(parseIsoTimestamp('2022-02-30')).toBeNull();
    expect(parseIsoTimestamp('2022-13-01')).toBeNull();
    expect(parseIsoTimestamp('2022-08-24T24:00:00')).toBeNull();
    expect(parseIsoTimestamp('yesterday')).toBeNull();
  });
});

describe('fromEpochMillis', () => {
  it('should format epoch milliseconds', () => {
    expect(fromEpochMillis(1661324097123)).toBe('2022-08-24T06:54:57.123000');
  });

  it('should keep fractional milliseconds as microseconds', () => {
    expect(fromEpochMillis(1.5)).toBe('1970-01-01T00:00:00.001500');
  });

  it('should reject non-finite values', () => {
    expect(fromEpochMillis(Number.NaN)).toBeNull();
    expect(fromEpochMillis(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('parseSubmitTime', () => {
  const clock = () => new Date('2024-05-01T10:00:00.250Z');

  it('should accept epoch milliseconds as a number or a string', () => {
    expect(parseSubmitTime(1661324097123)).toBe('2022-08-24T06:54:57.123000');
    expect(parseSubmitTime('1661324097123')).toBe('2022-08-24T06:54:57.123000');
  });

  it('should accept ISO datetimes', () => {
    expect(parseSubmitTime('2022-08-24T06:54:57.123456')).toBe('2022-08-24T06:54:57.123456');
  });

  it('should default to the clock when absent', () => {
    expect(parseSubmitTime(undefined, clock)).toBe('2024-05-01T10:00:00.250000');
    expect(parseSubmitTime(null, clock)).toBe('2024-05-01T10:00:00.250000');
    expect(nowTimestamp(clock)).toBe('2024-05-01T10:00:00.250000');
  });

  it('should reject other values with the expected format in the message', () => {
    expect(() => parseSubmitTime('not a time')).toThrow(InvalidTimestampError);
    expect(() => parseSubmitTime('not a time')).toThrow(
      "Expected timestamp in milliseconds or datetime (in format YYYY-MM-DDTHH:MM:SS.ffffff), got 'not a time'"
    );
    expect(() => parseSubmitTime(true)).toThrow("got 'true'");
  });
});

describe('fromStoredTimestamp', () => {
  it('should read Date values as UTC', () => {
    expect(fromStoredTimestamp(new Date(Date.UTC(2024, 0, 1, 12)))).toBe('2024-01-01T12:00:00.000000');
  });

  it('should read text values from the database', () => {
    expect(fromStoredTimestamp('2024-01-01 12:00:00.5')).toBe('2024-01-01T12:00:00.500000');
  });
});

describe('formatTimestamp', () => {
  it('should drop all-zero microseconds', () => {
    const value = parseSubmitTime('2024-01-01T00:00:00');
    expect(formatTimestamp(value)).toBe('2024-01-01T00:00:00');
  });

  it('should keep non-zero microseconds', () => {
    const value = parseSubmitTime('2024-01-01T00:00:00.12');
    expect(formatTimestamp(value)).toBe('2024-01-01T00:00:00.120000');
  });
});

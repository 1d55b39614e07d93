/**
 * Result submission normalization tests
 */

import { describe, it, expect } from 'vitest';
import { toPendingResult } from '../result-submission.js';
import { InvalidDataKeyError, InvalidTimestampError, ValidationError } from '../../errors/index.js';

const fixedClock = () => new Date('2024-06-01T08:00:00.000Z');

describe('toPendingResult', () => {
  it('should normalize a full submission', () => {
    const pending = toPendingResult(
      {
        testcase: { name: 'dist.rpmlint', ref_url: 'https://ci.test/rpmlint' },
        outcome: 'FAILED',
        note: '3 errors',
        ref_url: 'https://ci.test/run/1',
        submit_time: '2024-01-01T00:00:00',
        groups: ['g-1', { description: 'nightly' }],
        data: { item: ['grub', 'kernel'], count: 3, ok: true, gone: null, mixed: [null, 'x'] },
      },
      { generateUuid: () => 'generated-uuid' }
    );

    expect(pending).toEqual({
      testcase: { name: 'dist.rpmlint', refUrl: 'https://ci.test/rpmlint' },
      outcome: 'FAILED',
      submitTime: '2024-01-01T00:00:00.000000',
      note: '3 errors',
      refUrl: 'https://ci.test/run/1',
      groups: [{ uuid: 'g-1' }, { uuid: 'generated-uuid', description: 'nightly' }],
      data: [
        { key: 'item', value: 'grub' },
        { key: 'item', value: 'kernel' },
        { key: 'count', value: '3' },
        { key: 'ok', value: 'true' },
        { key: 'mixed', value: 'x' },
      ],
    });
  });

  it('should default optional fields', () => {
    const pending = toPendingResult({ testcase: 'tc_1', outcome: 'PASSED' }, { clock: fixedClock });

    expect(pending).toEqual({
      testcase: { name: 'tc_1' },
      outcome: 'PASSED',
      submitTime: '2024-06-01T08:00:00.000000',
      note: null,
      refUrl: null,
      groups: [],
      data: [],
    });
  });

  it('should accept epoch milliseconds', () => {
    const pending = toPendingResult({ testcase: 'tc_1', outcome: 'PASSED', submit_time: 1661324097123 });
    expect(pending.submitTime).toBe('2022-08-24T06:54:57.123000');
  });

  it('should accept any outcome unless a list is given', () => {
    expect(toPendingResult({ testcase: 'tc_1', outcome: 'SKIPPED' }).outcome).toBe('SKIPPED');
    expect(() =>
      toPendingResult({ testcase: 'tc_1', outcome: 'SKIPPED' }, { allowedOutcomes: ['PASSED', 'FAILED'] })
    ).toThrow('must be one of: PASSED, FAILED');
  });

  it('should reject an empty testcase name', () => {
    expect(() => toPendingResult({ testcase: '', outcome: 'PASSED' })).toThrow(ValidationError);
    expect(() => toPendingResult({ testcase: { name: '' }, outcome: 'PASSED' })).toThrow(
      'testcase name must be non-empty'
    );
    expect(() => toPendingResult({ testcase: {}, outcome: 'PASSED' })).toThrow('testcase name must be non-empty');
  });

  it('should reject data keys containing a colon', () => {
    expect(() => toPendingResult({ testcase: 'tc_1', outcome: 'PASSED', data: { 'item:like': 'x' } })).toThrow(
      InvalidDataKeyError
    );
  });

  it('should reject unreadable submit times', () => {
    expect(() => toPendingResult({ testcase: 'tc_1', outcome: 'PASSED', submit_time: 'noon' })).toThrow(
      InvalidTimestampError
    );
  });
});

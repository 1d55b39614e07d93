/**
 * Logging and metrics tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger, createLoggerOptions, withLogging } from '../logger.js';
import { metrics, normalizePath, resultsCommittedTotal } from '../metrics.js';

async function committedCount(outcome: string): Promise<number> {
  const snapshot = await resultsCommittedTotal.get();
  return snapshot.values.find((value) => value.labels.outcome === outcome)?.value ?? 0;
}

describe('logger', () => {
  it('should name the logger and redact secrets', () => {
    const options = createLoggerOptions('results-test');

    expect(options.name).toBe('results-test');
    expect(options.redact).toEqual(
      expect.objectContaining({
        censor: '[REDACTED]',
        paths: expect.arrayContaining(['password', '*.password', 'DATABASE_URL']),
      })
    );
  });

  it('should report duration and success of a wrapped operation', async () => {
    const logger = createLogger('results-test');
    const metric = vi.spyOn(logger, 'performanceMetric');

    await expect(withLogging(logger, 'migrate', async () => ['001'])).resolves.toEqual(['001']);

    expect(metric).toHaveBeenCalledWith('migrate', expect.any(Number), { status: 'success' });
  });

  it('should report failure and rethrow', async () => {
    const logger = createLogger('results-test');
    const metric = vi.spyOn(logger, 'performanceMetric');

    await expect(
      withLogging(logger, 'migrate', async () => {
        throw new Error('relation exists');
      })
    ).rejects.toThrow('relation exists');

    expect(metric).toHaveBeenCalledWith('migrate', expect.any(Number), { status: 'error' });
  });
});

describe('metrics', () => {
  it('should collapse numeric ids and uuids in paths', () => {
    expect(normalizePath('/api/v2.0/results/42?page=1')).toBe('/api/v2.0/results/:id');
    expect(normalizePath('/api/v2.0/groups/0f8fad5b-d9cb-469f-a165-70867728950e/results')).toBe(
      '/api/v2.0/groups/:id/results'
    );
    expect(normalizePath('/api/v2.0/testcases/scratch.1')).toBe('/api/v2.0/testcases/scratch.1');
  });

  it('should count committed results by outcome', async () => {
    const before = await committedCount('PASSED');

    metrics.recordResultCommitted('PASSED');
    metrics.recordResultCommitted('PASSED');

    expect(await committedCount('PASSED')).toBe(before + 2);
  });
});

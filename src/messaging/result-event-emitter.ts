/**
 * Result Event Emitter
 * @module messaging/result-event-emitter
 *
 * Announces committed results through a publisher with bounded retries and
 * exponential backoff. Publication never fails the caller: after the last
 * attempt the failure is logged and counted.
 */

import type { Result } from '../types/results.js';
import type { Serializer } from '../utils/serializers.js';
import { toError, withRetry } from '../errors/index.js';
import { getLogger } from '../logging/logger.js';
import { metrics } from '../logging/metrics.js';
import type { ResultPublisher } from './types.js';

export interface ResultEventEmitterConfig {
  /** Publication switched off entirely */
  readonly enabled: boolean;
  readonly retry: {
    readonly maxAttempts: number;
    readonly delayMs: number;
  };
}

export const DEFAULT_EVENT_EMITTER_CONFIG: ResultEventEmitterConfig = {
  enabled: true,
  retry: {
    maxAttempts: 3,
    delayMs: 100,
  },
};

export interface IResultEventEmitter {
  /** Resolves once the event is out or given up on; never rejects */
  publish(result: Result): Promise<void>;
  close(): Promise<void>;
}

export class ResultEventEmitter implements IResultEventEmitter {
  private readonly config: ResultEventEmitterConfig;

  constructor(
    private readonly publisher: ResultPublisher,
    private readonly serializer: Serializer,
    config: Partial<ResultEventEmitterConfig> = {}
  ) {
    this.config = { ...DEFAULT_EVENT_EMITTER_CONFIG, ...config };
  }

  async publish(result: Result): Promise<void> {
    if (!this.config.enabled) {
      return;
    }

    const logger = getLogger();
    const event = this.serializer.result(result);

    try {
      await withRetry(() => this.publisher.publish(event), {
        maxAttempts: this.config.retry.maxAttempts,
        delayMs: this.config.retry.delayMs,
        retryIf: () => true,
        onRetry: (error, attempt) => logger.publishRetried(result.id, attempt, error),
      });
    } catch (error) {
      logger.publishFailed(result.id, toError(error), this.config.retry.maxAttempts);
      metrics.recordPublishFailure(this.publisher.name);
    }
  }

  close(): Promise<void> {
    return this.publisher.close();
  }
}

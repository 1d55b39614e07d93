/**
 * Result Service
 * @module services/result-service
 *
 * Querying and committing results on top of a storage driver.
 */

import type { PendingResult, Result } from '../types/results.js';
import type { Page, ResultQuery } from '../query/types.js';
import type { ResultStore } from '../repositories/interfaces.js';
import type { IResultEventEmitter } from '../messaging/result-event-emitter.js';
import { DistinctOnWithoutFilterError, NotFoundError } from '../errors/index.js';
import { getLogger } from '../logging/logger.js';
import { metrics } from '../logging/metrics.js';
import { validatePendingResult } from './result-submission.js';

/** Largest id the `results.id` column holds */
const MAX_RESULT_ID = 2_147_483_647;

export interface IResultService {
  queryResults(query: ResultQuery): Promise<Page<Result>>;
  getResult(id: number): Promise<Result>;
  commitResult(pending: PendingResult): Promise<Result>;
}

export class ResultService implements IResultService {
  constructor(
    private readonly store: ResultStore,
    private readonly events: IResultEventEmitter
  ) {}

  /**
   * Filtered listing, or the newest result per (testcase, `distinctOn`
   * value) when `latest` is set. `distinctOn` only applies to latest
   * queries.
   *
   * @throws DistinctOnWithoutFilterError when `distinctOn` is the only constraint
   */
  async queryResults(query: ResultQuery): Promise<Page<Result>> {
    const start = Date.now();
    const { predicates, sort, page } = query;

    let found: Page<Result>;
    if (query.latest) {
      if (query.distinctOn !== null && predicates.length === 0) {
        throw new DistinctOnWithoutFilterError();
      }
      found = await this.store.results.findLatest({ predicates, sort, page, distinctOn: query.distinctOn });
    } else {
      found = await this.store.results.findMany({ predicates, sort, page });
    }

    const durationMs = Date.now() - start;
    metrics.recordResultQuery(query.latest, durationMs / 1000);
    getLogger().resultsQueried(found.items.length, query.latest, durationMs);
    return found;
  }

  async getResult(id: number): Promise<Result> {
    if (!Number.isInteger(id) || id < 0 || id > MAX_RESULT_ID) {
      throw NotFoundError.result(id);
    }
    const result = await this.store.results.findById(id);
    if (!result) {
      throw NotFoundError.result(id);
    }
    return result;
  }

  /**
   * Persist a result in one transaction, then announce it without waiting
   * for the publisher
   */
  async commitResult(pending: PendingResult): Promise<Result> {
    validatePendingResult(pending);

    const logger = getLogger();
    const start = Date.now();
    const result = await this.store.results.commit(pending);

    metrics.recordResultCommitted(result.outcome);
    logger.resultCommitted(result.id, result.testcase.name, Date.now() - start);

    this.events.publish(result).catch((error: unknown) => {
      logger.error({ err: error, resultId: result.id }, 'Result event emitter failed');
    });

    return result;
  }
}

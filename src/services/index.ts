/**
 * Services Module Exports
 * @module services
 *
 * Central exports for the application services and the container wiring
 * them to a store and a publisher.
 */

import type { AppConfig } from '../config/index.js';
import type { ResultStore } from '../repositories/interfaces.js';
import type { ResultPublisher } from '../messaging/types.js';
import { ResultEventEmitter } from '../messaging/result-event-emitter.js';
import type { Serializer } from '../utils/serializers.js';
import { ResultService } from './result-service.js';
import { CatalogService } from './catalog-service.js';

export { ResultService } from './result-service.js';
export type { IResultService } from './result-service.js';
export { CatalogService } from './catalog-service.js';
export type { GroupInput } from './catalog-service.js';
export { toPendingResult, validatePendingResult } from './result-submission.js';
export type {
  DataScalar,
  GroupSubmission,
  ResultSubmission,
  SubmissionOptions,
  TestcaseSubmission,
} from './result-submission.js';

export interface Services {
  readonly results: ResultService;
  readonly catalog: CatalogService;
  readonly events: ResultEventEmitter;
}

/**
 * Wire services over a store; events are serialized with `serializer`
 */
export function createServices(
  store: ResultStore,
  publisher: ResultPublisher,
  serializer: Serializer,
  messaging: Pick<AppConfig['messaging'], 'enabled' | 'retry'>
): Services {
  const events = new ResultEventEmitter(publisher, serializer, {
    enabled: messaging.enabled,
    retry: messaging.retry,
  });

  return {
    results: new ResultService(store, events),
    catalog: new CatalogService(store),
    events,
  };
}

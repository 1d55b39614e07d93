/**
 * Messaging Module
 * @module messaging
 */

import type { MessagingConfig } from '../config/index.js';
import { DummyPublisher } from './dummy-publisher.js';
import { RedisPublisher, createRedisClient } from './redis-publisher.js';
import type { ResultPublisher } from './types.js';

export type { ResultEvent, ResultPublisher } from './types.js';
export { DummyPublisher } from './dummy-publisher.js';
export { RedisPublisher, createRedisClient } from './redis-publisher.js';
export type { RedisPublishClient } from './redis-publisher.js';
export {
  ResultEventEmitter,
  DEFAULT_EVENT_EMITTER_CONFIG,
} from './result-event-emitter.js';
export type { IResultEventEmitter, ResultEventEmitterConfig } from './result-event-emitter.js';

/**
 * Publisher selected by `messaging.plugin`
 */
export function createPublisher(config: MessagingConfig): ResultPublisher {
  switch (config.plugin) {
    case 'redis':
      return new RedisPublisher(createRedisClient(config.redisUrl), config.channel);
    case 'dummy':
      return new DummyPublisher();
  }
}

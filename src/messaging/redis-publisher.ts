/**
 * Redis Publisher
 * @module messaging/redis-publisher
 *
 * Publishes result events as JSON on a Redis pub/sub channel using ioredis.
 */

import { Redis } from 'ioredis';
import { createModuleLogger } from '../logging/logger.js';
import { PublishError, toError } from '../errors/index.js';
import type { ResultEvent, ResultPublisher } from './types.js';

const logger = createModuleLogger('redis-publisher');

/**
 * Redis client instance type
 */
type RedisClient = InstanceType<typeof Redis>;

/**
 * The part of the client the publisher uses
 */
export type RedisPublishClient = Pick<RedisClient, 'publish' | 'quit'>;

/**
 * Connect lazily; the first publish opens the connection
 */
export function createRedisClient(url: string): RedisClient {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => {
      if (times > 3) {
        logger.error('Redis connection failed after 3 retries');
        return null;
      }
      return Math.min(times * 100, 3000);
    },
  });

  client.on('connect', () => {
    logger.info('Redis publisher connected');
  });

  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis publisher error');
  });

  return client;
}

export class RedisPublisher implements ResultPublisher {
  readonly name = 'redis';

  constructor(
    private readonly client: RedisPublishClient,
    private readonly channel: string
  ) {}

  /**
   * @throws PublishError wrapping the client failure
   */
  async publish(event: ResultEvent): Promise<void> {
    let receivers: number;
    try {
      receivers = await this.client.publish(this.channel, JSON.stringify(event));
    } catch (error) {
      throw new PublishError(this.channel, { cause: toError(error), details: { resultId: event.id } });
    }
    logger.debug({ channel: this.channel, resultId: event.id, receivers }, 'Result event published');
  }

  async close(): Promise<void> {
    await this.client.quit();
    logger.info('Redis publisher closed');
  }
}

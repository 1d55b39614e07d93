/**
 * Dummy Publisher
 * @module messaging/dummy-publisher
 *
 * Keeps published events in memory instead of sending them anywhere.
 */

import type { ResultEvent, ResultPublisher } from './types.js';

export class DummyPublisher implements ResultPublisher {
  readonly name = 'dummy';
  readonly history: ResultEvent[] = [];

  async publish(event: ResultEvent): Promise<void> {
    this.history.push(event);
  }

  async close(): Promise<void> {
    this.history.length = 0;
  }
}

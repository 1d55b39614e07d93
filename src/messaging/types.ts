/**
 * Messaging Type Definitions
 * @module messaging/types
 */

import type { SerializedResult } from '../utils/serializers.js';

/**
 * Payload announced for every committed result
 */
export type ResultEvent = SerializedResult;

/**
 * Destination for result events
 */
export interface ResultPublisher {
  /** Plugin name, used as a metrics label */
  readonly name: string;
  publish(event: ResultEvent): Promise<void>;
  close(): Promise<void>;
}

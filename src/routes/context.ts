/**
 * Route Plugin Context
 * @module routes/context
 */

import type { FastifyRequest } from 'fastify';
import type { AppConfig } from '../config/index.js';
import type { ResultStore } from '../repositories/interfaces.js';
import type { Services } from '../services/index.js';
import type { Page } from '../query/types.js';
import { Serializer } from '../utils/serializers.js';
import type { PagedResponse } from '../utils/serializers.js';
import type { FilterQuery } from './schemas/common.js';

export const API_PREFIX = '/api/v2.0';

/**
 * Options every API route plugin is registered with
 */
export interface ApiRouteOptions {
  readonly config: AppConfig;
  readonly store: ResultStore;
  readonly services: Services;
}

/**
 * API root as seen by clients: `PUBLIC_URL` when configured, the request
 * host otherwise
 */
export function serializerFor(request: FastifyRequest, config: AppConfig): Serializer {
  const origin = config.server.publicUrl ?? `${request.protocol}://${request.hostname}`;
  return new Serializer(`${origin.replace(/\/+$/, '')}${API_PREFIX}`);
}

/**
 * `{ prev, next, data }` envelope for a page of entities
 */
export function pagedResponse<TEntity, TWire>(
  serializer: Serializer,
  path: string,
  query: FilterQuery,
  page: number,
  found: Page<TEntity>,
  serialize: (entity: TEntity) => TWire
): PagedResponse<TWire> {
  return {
    ...serializer.pageLinks(path, query, page, found.hasMore),
    data: found.items.map(serialize),
  };
}

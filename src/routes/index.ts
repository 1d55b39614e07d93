/**
 * Route Registration
 * @module routes
 *
 * Registers every API route plugin under `/api/v2.0`.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import landingRoutes from './landing.js';
import healthRoutes from './health.js';
import resultRoutes from './results.js';
import testcaseRoutes from './testcases.js';
import groupRoutes from './groups.js';
import { API_PREFIX, type ApiRouteOptions } from './context.js';

export { API_PREFIX, serializerFor } from './context.js';
export type { ApiRouteOptions } from './context.js';

const routes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  const prefixed = { ...options, prefix: API_PREFIX };

  // GET /api/v2.0
  await fastify.register(landingRoutes, prefixed);

  // GET /api/v2.0/healthcheck
  await fastify.register(healthRoutes, prefixed);

  // GET, POST /api/v2.0/results[/latest|/:id]
  await fastify.register(resultRoutes, prefixed);

  // GET, POST /api/v2.0/testcases[/:name[/results]]
  await fastify.register(testcaseRoutes, prefixed);

  // GET, POST /api/v2.0/groups[/:uuid[/results]]
  await fastify.register(groupRoutes, prefixed);
};

export default routes;

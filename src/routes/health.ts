/**
 * Health Check Routes
 * @module routes/health
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { MessageResponseSchema, type MessageResponse } from './schemas/common.js';
import type { ApiRouteOptions } from './context.js';

export const HEALTHY_MESSAGE = 'Health check OK';
export const UNHEALTHY_MESSAGE = 'Unable to communicate with database';

/**
 * Health check routes plugin
 */
const healthRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  /**
   * GET /healthcheck
   */
  fastify.get<{ Reply: MessageResponse }>(
    '/healthcheck',
    {
      schema: {
        response: {
          200: MessageResponseSchema,
          503: MessageResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const healthy = await options.store.healthCheck();
      if (!healthy) {
        request.log.warn({ driver: options.store.driver }, 'Health check failed');
        return reply.status(503).send({ message: UNHEALTHY_MESSAGE });
      }
      return reply.status(200).send({ message: HEALTHY_MESSAGE });
    }
  );
};

export default healthRoutes;

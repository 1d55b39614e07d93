/**
 * API Landing Route
 * @module routes/landing
 *
 * GET / answers 300 Multiple Choices with the outcomes the service knows
 * and a pointer to the documentation.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { knownOutcomes } from '../config/index.js';
import { LandingResponseSchema, type LandingResponse } from './schemas/results.js';
import { serializerFor, type ApiRouteOptions } from './context.js';

const landingRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  fastify.get<{ Reply: LandingResponse }>(
    '/',
    {
      schema: {
        response: {
          300: LandingResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const serializer = serializerFor(request, options.config);
      return reply.status(300).send({
        outcomes: knownOutcomes(options.config.results),
        documentation: serializer.url('/results'),
      });
    }
  );
};

export default landingRoutes;

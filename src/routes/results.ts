/**
 * Result Routes
 * @module routes/results
 *
 * Endpoints:
 * - GET /results - Filtered listing
 * - GET /results/latest - Newest result per testcase (and `_distinct_on` value)
 * - GET /results/:id - Single result
 * - POST /results - Submit a result
 */

import { FastifyInstance, FastifyPluginAsync, FastifyRequest } from 'fastify';
import { knownOutcomes } from '../config/index.js';
import { parseResultFilters } from '../query/filter-parser.js';
import { toPendingResult } from '../services/result-submission.js';
import type { PagedResponse, SerializedResult } from '../utils/serializers.js';
import {
  ErrorResponseSchema,
  FilterQuerySchema,
  parsePageRequest,
  type FilterQuery,
} from './schemas/common.js';
import {
  ResultBodySchema,
  ResultIdParamsSchema,
  type ResultBody,
  type ResultIdParams,
} from './schemas/results.js';
import { pagedResponse, serializerFor, type ApiRouteOptions } from './context.js';

const resultRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  const { config, services } = options;

  async function listResults(
    request: FastifyRequest<{ Querystring: FilterQuery }>,
    path: string,
    latest: boolean
  ): Promise<PagedResponse<SerializedResult>> {
    const filters = parseResultFilters(request.query);
    const page = parsePageRequest(request.query, config.results.queryLimit);
    const found = await services.results.queryResults({ ...filters, latest, page });
    const serializer = serializerFor(request, config);
    return pagedResponse(serializer, path, request.query, page.page, found, (result) => serializer.result(result));
  }

  /**
   * GET /results
   */
  fastify.get<{ Querystring: FilterQuery }>(
    '/results',
    {
      schema: {
        querystring: FilterQuerySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request) => listResults(request, '/results', false)
  );

  /**
   * GET /results/latest
   */
  fastify.get<{ Querystring: FilterQuery }>(
    '/results/latest',
    {
      schema: {
        querystring: FilterQuerySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request) => listResults(request, '/results/latest', true)
  );

  /**
   * GET /results/:id
   */
  fastify.get<{ Params: ResultIdParams }>(
    '/results/:id',
    {
      schema: {
        params: ResultIdParamsSchema,
        response: {
          404: ErrorResponseSchema,
        },
      },
    },
    async (request): Promise<SerializedResult> => {
      const result = await services.results.getResult(Number(request.params.id));
      return serializerFor(request, config).result(result);
    }
  );

  /**
   * POST /results
   */
  fastify.post<{ Body: ResultBody }>(
    '/results',
    {
      schema: {
        body: ResultBodySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const pending = toPendingResult(request.body, {
        allowedOutcomes: config.results.requireKnownOutcome ? knownOutcomes(config.results) : undefined,
      });
      const result = await services.results.commitResult(pending);
      request.log.info({ resultId: result.id }, 'Result created');
      return reply.status(201).send(serializerFor(request, config).result(result));
    }
  );
};

export default resultRoutes;

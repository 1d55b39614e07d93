/**
 * Group Routes
 * @module routes/groups
 *
 * Endpoints:
 * - GET /groups - List groups (`uuid`, `description`, with `:like`)
 * - GET /groups/:uuid - Single group
 * - GET /groups/:uuid/results - Results in the group
 * - POST /groups - Create or update a group
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { parseColumnFilters, parseResultFilters } from '../query/filter-parser.js';
import type { GroupColumn } from '../query/types.js';
import type { PagedResponse, SerializedGroup, SerializedResult } from '../utils/serializers.js';
import {
  ErrorResponseSchema,
  FilterQuerySchema,
  parsePageRequest,
  type FilterQuery,
} from './schemas/common.js';
import {
  GroupBodySchema,
  GroupUuidParamsSchema,
  type GroupBody,
  type GroupUuidParams,
} from './schemas/results.js';
import { pagedResponse, serializerFor, type ApiRouteOptions } from './context.js';

const GROUP_COLUMNS: readonly GroupColumn[] = ['uuid', 'description'];

const groupRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  const { config, services } = options;

  /**
   * GET /groups
   */
  fastify.get<{ Querystring: FilterQuery }>(
    '/groups',
    {
      schema: {
        querystring: FilterQuerySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request): Promise<PagedResponse<SerializedGroup>> => {
      const filters = parseColumnFilters(request.query, GROUP_COLUMNS);
      const page = parsePageRequest(request.query, config.results.queryLimit);
      const found = await services.catalog.listGroups(filters, page);
      const serializer = serializerFor(request, config);
      return pagedResponse(serializer, '/groups', request.query, page.page, found, (group) =>
        serializer.group(group)
      );
    }
  );

  /**
   * GET /groups/:uuid
   */
  fastify.get<{ Params: GroupUuidParams }>(
    '/groups/:uuid',
    {
      schema: {
        params: GroupUuidParamsSchema,
        response: {
          404: ErrorResponseSchema,
        },
      },
    },
    async (request): Promise<SerializedGroup> => {
      const group = await services.catalog.getGroup(request.params.uuid);
      return serializerFor(request, config).group(group);
    }
  );

  /**
   * GET /groups/:uuid/results
   */
  fastify.get<{ Params: GroupUuidParams; Querystring: FilterQuery }>(
    '/groups/:uuid/results',
    {
      schema: {
        params: GroupUuidParamsSchema,
        querystring: FilterQuerySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request): Promise<PagedResponse<SerializedResult>> => {
      const { uuid } = request.params;
      const filters = parseResultFilters(request.query);
      const page = parsePageRequest(request.query, config.results.queryLimit);
      const found = await services.results.queryResults({
        ...filters,
        predicates: [...filters.predicates, { kind: 'groups', match: { operator: 'in', values: [uuid] } }],
        latest: false,
        page,
      });
      const serializer = serializerFor(request, config);
      return pagedResponse(
        serializer,
        `/groups/${encodeURIComponent(uuid)}/results`,
        request.query,
        page.page,
        found,
        (result) => serializer.result(result)
      );
    }
  );

  /**
   * POST /groups
   */
  fastify.post<{ Body: GroupBody }>(
    '/groups',
    {
      schema: {
        body: GroupBodySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const group = await services.catalog.saveGroup({
        uuid: request.body.uuid,
        description: request.body.description,
        refUrl: request.body.ref_url,
      });
      return reply.status(201).send(serializerFor(request, config).group(group));
    }
  );
};

export default groupRoutes;

/**
 * Testcase Routes
 * @module routes/testcases
 *
 * Testcase names may contain `/`, so single-testcase routes are served by
 * one wildcard route. A trailing `/results` selects the testcase's results.
 *
 * Endpoints:
 * - GET /testcases - List testcases (`name`, `name:like`)
 * - GET /testcases/:name - Single testcase
 * - GET /testcases/:name/results - Results of the testcase
 * - POST /testcases - Create or update a testcase
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { parseColumnFilters, parseResultFilters } from '../query/filter-parser.js';
import type { TestcaseColumn } from '../query/types.js';
import { testcasePath } from '../utils/serializers.js';
import type { PagedResponse, SerializedResult, SerializedTestcase } from '../utils/serializers.js';
import {
  ErrorResponseSchema,
  FilterQuerySchema,
  parsePageRequest,
  type FilterQuery,
} from './schemas/common.js';
import { TestcaseBodySchema, type TestcaseBody } from './schemas/results.js';
import { pagedResponse, serializerFor, type ApiRouteOptions } from './context.js';

const TESTCASE_COLUMNS: readonly TestcaseColumn[] = ['name'];
const RESULTS_SUFFIX = '/results';

/**
 * Split a wildcard path into the testcase name and whether the results
 * listing was requested
 */
export function parseTestcasePath(path: string): { name: string; results: boolean } {
  if (path.endsWith(RESULTS_SUFFIX) && path.length > RESULTS_SUFFIX.length) {
    return { name: path.slice(0, -RESULTS_SUFFIX.length), results: true };
  }
  return { name: path, results: false };
}

const testcaseRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  const { config, services } = options;

  /**
   * GET /testcases
   */
  fastify.get<{ Querystring: FilterQuery }>(
    '/testcases',
    {
      schema: {
        querystring: FilterQuerySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request): Promise<PagedResponse<SerializedTestcase>> => {
      const filters = parseColumnFilters(request.query, TESTCASE_COLUMNS);
      const page = parsePageRequest(request.query, config.results.queryLimit);
      const found = await services.catalog.listTestcases(filters, page);
      const serializer = serializerFor(request, config);
      return pagedResponse(serializer, '/testcases', request.query, page.page, found, (testcase) =>
        serializer.testcase(testcase)
      );
    }
  );

  /**
   * GET /testcases/:name and GET /testcases/:name/results
   */
  fastify.get<{ Params: { '*': string }; Querystring: FilterQuery }>(
    '/testcases/*',
    {
      schema: {
        querystring: FilterQuerySchema,
        response: {
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request): Promise<SerializedTestcase | PagedResponse<SerializedResult>> => {
      const serializer = serializerFor(request, config);
      const { name, results } = parseTestcasePath(request.params['*']);

      if (!results) {
        return serializer.testcase(await services.catalog.getTestcase(name));
      }

      const filters = parseResultFilters(request.query);
      const page = parsePageRequest(request.query, config.results.queryLimit);
      const found = await services.results.queryResults({
        ...filters,
        predicates: [...filters.predicates, { kind: 'testcases', match: { operator: 'in', values: [name] } }],
        latest: false,
        page,
      });
      return pagedResponse(
        serializer,
        `${testcasePath(name)}${RESULTS_SUFFIX}`,
        request.query,
        page.page,
        found,
        (result) => serializer.result(result)
      );
    }
  );

  /**
   * POST /testcases
   */
  fastify.post<{ Body: TestcaseBody }>(
    '/testcases',
    {
      schema: {
        body: TestcaseBodySchema,
        response: {
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const testcase = await services.catalog.saveTestcase({
        name: request.body.name,
        refUrl: request.body.ref_url,
      });
      return reply.status(201).send(serializerFor(request, config).testcase(testcase));
    }
  );
};

export default testcaseRoutes;

/**
 * Testcase and Group Routes Integration Tests
 * @module tests/integration/routes/catalog.routes
 *
 * Endpoints tested:
 * - GET, POST /api/v2.0/testcases
 * - GET /api/v2.0/testcases/:name and /api/v2.0/testcases/:name/results
 * - GET, POST /api/v2.0/groups
 * - GET /api/v2.0/groups/:uuid and /api/v2.0/groups/:uuid/results
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type {
  PagedResponse,
  SerializedGroup,
  SerializedResult,
  SerializedTestcase,
} from '../../../src/utils/serializers.js';
import type { ErrorResponse } from '../../../src/middleware/error-handler.js';
import { parseTestcasePath } from '../../../src/routes/testcases.js';
import { API_ROOT, buildTestApp } from '../../helpers/index.js';

const BASE = '/api/v2.0';
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('parseTestcasePath', () => {
  it('should split off a trailing results segment', () => {
    expect(parseTestcasePath('compose/install/results')).toEqual({ name: 'compose/install', results: true });
    expect(parseTestcasePath('compose/install')).toEqual({ name: 'compose/install', results: false });
    expect(parseTestcasePath('/results')).toEqual({ name: '/results', results: false });
  });
});

describe('Catalog Routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    ({ app } = await buildTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  async function post(url: string, payload: Record<string, unknown>) {
    return app.inject({ method: 'POST', url: `${BASE}${url}`, payload });
  }

  async function get(url: string) {
    return app.inject({ method: 'GET', url: `${BASE}${url}` });
  }

  // ==========================================================================
  // Testcases
  // ==========================================================================

  describe('testcases', () => {
    it('should create and fetch a testcase whose name contains slashes', async () => {
      const created = await post('/testcases', { name: 'compose/install', ref_url: 'https://ci.test/install' });

      expect(created.statusCode).toBe(201);
      expect(created.json<SerializedTestcase>()).toEqual({
        name: 'compose/install',
        ref_url: 'https://ci.test/install',
        href: `${API_ROOT}/testcases/compose/install`,
      });

      const fetched = await get('/testcases/compose/install');
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json<SerializedTestcase>().name).toBe('compose/install');
    });

    it('should keep the stored ref_url when a result omits it', async () => {
      await post('/testcases', { name: 'tc_1', ref_url: 'https://ci.test/tc_1' });
      await post('/results', { testcase: 'tc_1', outcome: 'PASSED' });

      const fetched = await get('/testcases/tc_1');
      expect(fetched.json<SerializedTestcase>().ref_url).toBe('https://ci.test/tc_1');
    });

    it('should keep the stored ref_url when a result sends null', async () => {
      await post('/testcases', { name: 'tc_1', ref_url: 'https://ci.test/tc_1' });
      await post('/results', { testcase: { name: 'tc_1', ref_url: null }, outcome: 'PASSED' });

      const fetched = await get('/testcases/tc_1');
      expect(fetched.json<SerializedTestcase>().ref_url).toBe('https://ci.test/tc_1');
    });

    it('should update the ref_url in place when a later result brings a new one', async () => {
      await post('/results', { testcase: { name: 'tc_1', ref_url: 'https://ci.test/v1' }, outcome: 'PASSED' });
      await post('/results', { testcase: { name: 'tc_1', ref_url: 'https://ci.test/v2' }, outcome: 'FAILED' });

      const fetched = await get('/testcases/tc_1');
      expect(fetched.json<SerializedTestcase>().ref_url).toBe('https://ci.test/v2');

      const listing = (await get('/testcases')).json<PagedResponse<SerializedTestcase>>();
      expect(listing.data.map((testcase) => testcase.name)).toEqual(['tc_1']);
    });

    it('should list the results of a testcase', async () => {
      await post('/results', { testcase: 'compose/install', outcome: 'PASSED', data: { arch: 'x86_64' } });
      await post('/results', { testcase: 'compose/install', outcome: 'FAILED', data: { arch: 'aarch64' } });
      await post('/results', { testcase: 'other', outcome: 'FAILED', data: { arch: 'x86_64' } });

      const response = await get('/testcases/compose/install/results?arch=x86_64');

      expect(response.statusCode).toBe(200);
      const page = response.json<PagedResponse<SerializedResult>>();
      expect(page.data.map((result) => result.id)).toEqual([1]);
    });

    it('should answer 404 for unknown testcases', async () => {
      const response = await get('/testcases/missing');

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorResponse>().message).toBe('Testcase not found');
    });

    it('should filter the listing by name', async () => {
      for (const name of ['compose.b', 'compose.a', 'dist.rpmlint']) {
        await post('/testcases', { name });
      }

      const response = await get('/testcases?name:like=compose.*');
      const page = response.json<PagedResponse<SerializedTestcase>>();

      expect(page.data.map((testcase) => testcase.name)).toEqual(['compose.a', 'compose.b']);
      expect(page.next).toBeNull();
    });

    it('should reject an empty name', async () => {
      const response = await post('/testcases', { name: '' });
      expect(response.statusCode).toBe(400);
    });
  });

  // ==========================================================================
  // Groups
  // ==========================================================================

  describe('groups', () => {
    it('should create a group with the given uuid', async () => {
      const response = await post('/groups', { uuid: 'g-1', description: 'nightly' });

      expect(response.statusCode).toBe(201);
      expect(response.json<SerializedGroup>()).toEqual({
        uuid: 'g-1',
        description: 'nightly',
        ref_url: null,
        href: `${API_ROOT}/groups/g-1`,
        results_count: 0,
        results: `${API_ROOT}/results?groups=g-1`,
      });
    });

    it('should generate a uuid when none is given', async () => {
      const response = await post('/groups', { description: 'ad hoc' });

      expect(response.statusCode).toBe(201);
      expect(response.json<SerializedGroup>().uuid).toMatch(UUID_V4);
    });

    it('should count and list the results of a group', async () => {
      await post('/groups', { uuid: 'g-1' });
      await post('/results', { testcase: 'tc_1', outcome: 'PASSED', groups: ['g-1'] });
      await post('/results', { testcase: 'tc_2', outcome: 'PASSED', groups: ['g-1', 'g-2'] });
      await post('/results', { testcase: 'tc_3', outcome: 'PASSED' });

      const group = await get('/groups/g-1');
      expect(group.json<SerializedGroup>().results_count).toBe(2);

      const results = await get('/groups/g-1/results');
      expect(results.json<PagedResponse<SerializedResult>>().data.map((result) => result.id)).toEqual([2, 1]);

      const filtered = await get('/results?groups=g-2');
      expect(filtered.json<PagedResponse<SerializedResult>>().data.map((result) => result.id)).toEqual([2]);
    });

    it('should create groups referenced by a result', async () => {
      const created = await post('/results', {
        testcase: 'tc_1',
        outcome: 'PASSED',
        groups: [{ uuid: 'g-9', description: 'from result' }, { description: 'anonymous' }],
      });
      const [named, generated] = created.json<SerializedResult>().groups;

      expect(named).toBe('g-9');
      expect(generated).toMatch(UUID_V4);
      const listed = await get('/groups?description:like=*result');
      expect(listed.json<PagedResponse<SerializedGroup>>().data.map((group) => group.uuid)).toEqual(['g-9']);
    });

    it('should answer 404 for unknown groups', async () => {
      const response = await get('/groups/unknown');

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorResponse>().message).toBe('Group not found');
    });
  });
});

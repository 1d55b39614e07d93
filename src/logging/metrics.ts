/**
 * Prometheus Metrics
 * @module logging/metrics
 *
 * Counters and histograms for HTTP traffic, result commits, queries and
 * message publication.
 */

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

// ============================================================================
// Registry Setup
// ============================================================================

/**
 * Dedicated metrics registry for the application
 */
export const metricsRegistry = new Registry();

metricsRegistry.setDefaultLabels({
  service: process.env.SERVICE_NAME || 'results-api',
  environment: process.env.NODE_ENV || 'development',
});

collectDefaultMetrics({ register: metricsRegistry, prefix: 'resultsdb_' });

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestsTotal = new Counter({
  name: 'resultsdb_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status_code'],
  registers: [metricsRegistry],
});

export const httpRequestDuration = new Histogram({
  name: 'resultsdb_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [metricsRegistry],
});

// ============================================================================
// Result Metrics
// ============================================================================

export const resultsCommittedTotal = new Counter({
  name: 'resultsdb_results_committed_total',
  help: 'Total number of committed results',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

export const resultQueryDuration = new Histogram({
  name: 'resultsdb_result_query_duration_seconds',
  help: 'Result query duration in seconds',
  labelNames: ['latest'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [metricsRegistry],
});

export const publishFailuresTotal = new Counter({
  name: 'resultsdb_publish_failures_total',
  help: 'Results whose publication failed after every retry',
  labelNames: ['plugin'],
  registers: [metricsRegistry],
});

// ============================================================================
// Metric Helpers
// ============================================================================

export const metrics = {
  recordHttpRequest(method: string, path: string, statusCode: number, durationSeconds: number) {
    const labels = { method, path, status_code: String(statusCode) };
    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  },

  recordResultCommitted(outcome: string) {
    resultsCommittedTotal.inc({ outcome });
  },

  recordResultQuery(latest: boolean, durationSeconds: number) {
    resultQueryDuration.observe({ latest: String(latest) }, durationSeconds);
  },

  recordPublishFailure(plugin: string) {
    publishFailuresTotal.inc({ plugin });
  },
};

/**
 * Collapses numeric ids and uuids so label cardinality stays bounded
 */
export function normalizePath(path: string): string {
  const [withoutQuery = ''] = path.split('?');
  return withoutQuery
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
    .replace(/\/\d+(?=\/|$)/g, '/:id');
}

// ============================================================================
// Fastify Plugin
// ============================================================================

export interface MetricsPluginOptions {
  path?: string;
  excludePaths?: string[];
}

const metricsPluginImpl: FastifyPluginAsync<MetricsPluginOptions> = async (fastify, opts) => {
  const metricsPath = opts.path ?? '/metrics';
  const excludePaths = opts.excludePaths ?? [metricsPath, '/favicon.ico'];

  fastify.get(metricsPath, async (_request, reply) => {
    reply.header('Content-Type', metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const path = request.routeOptions.url ?? normalizePath(request.url);
    if (excludePaths.some((excluded) => path === excluded)) {
      return;
    }
    metrics.recordHttpRequest(request.method, path, reply.statusCode, reply.elapsedTime / 1000);
  });
};

export const metricsPlugin = fp(metricsPluginImpl, { name: 'metrics', fastify: '4.x' });

/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import type { AppConfig } from './config/index.js';
import { createLoggerOptions, createModuleLogger } from './logging/logger.js';
import { metricsPlugin } from './logging/metrics.js';
import errorHandler from './middleware/error-handler.js';
import routes, { API_PREFIX } from './routes/index.js';
import { createResultStore } from './repositories/index.js';
import type { ResultStore } from './repositories/interfaces.js';
import { createPublisher } from './messaging/index.js';
import type { ResultPublisher } from './messaging/types.js';
import { createServices } from './services/index.js';
import { Serializer } from './utils/serializers.js';

/**
 * Application options
 */
export interface AppOptions {
  config: AppConfig;
  /** Storage driver; built from `config.storage` when absent */
  store?: ResultStore;
  /** Event publisher; built from `config.messaging` when absent */
  publisher?: ResultPublisher;
  /**
   * Request logging
   * @default true
   */
  logger?: boolean;
}

function loggerOptions(config: AppConfig, enabled: boolean): FastifyServerOptions['logger'] {
  if (!enabled) {
    return false;
  }
  return {
    ...createLoggerOptions('http'),
    level: config.logging.level,
    transport: config.logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };
}

/**
 * Root URL used in published events, where no request host is known
 */
export function eventBaseUrl(config: AppConfig): string {
  const origin = config.server.publicUrl ?? `http://${config.server.host}:${config.server.port}`;
  return `${origin.replace(/\/+$/, '')}${API_PREFIX}`;
}

/**
 * Create and configure Fastify application instance
 */
export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { config } = opts;
  const logger = createModuleLogger('app-factory');

  const app = Fastify({
    logger: loggerOptions(config, opts.logger ?? true),
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    bodyLimit: config.server.bodyLimit,
    trustProxy: config.server.trustProxy,
    // Union schemas (string | null, scalar data values) must see the submitted types
    ajv: { customOptions: { coerceTypes: false } },
  });

  const store = opts.store ?? (await createResultStore(config));
  const publisher = opts.publisher ?? createPublisher(config.messaging);
  const services = createServices(store, publisher, new Serializer(eventBaseUrl(config)), config.messaging);

  // CORS
  const origins = config.server.cors.origins;
  await app.register(cors, {
    origin: origins.includes('*') ? true : origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  });
  logger.debug('CORS plugin registered');

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  });
  logger.debug('Helmet plugin registered');

  if (config.server.rateLimit.enabled) {
    await app.register(rateLimit, {
      max: config.server.rateLimit.max,
      timeWindow: config.server.rateLimit.windowMs,
      keyGenerator: (request) => request.ip,
    });
    logger.debug('Rate limit plugin registered');
  }

  // Error handler (must be before routes)
  await app.register(errorHandler);

  await app.register(metricsPlugin);

  await app.register(routes, { config, store, services });
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing...');
    await services.events.close();
    await store.close();
  });

  return app;
}

export default buildApp;

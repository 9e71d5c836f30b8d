/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import {
  makeHealthRoutes,
  makeSalesDataHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import { makeSalesRoutes, type SalesStore } from '../modules/sales/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  salesStore: SalesStore;
  config: AppConfig;
  /** Extra readiness checks; the sales data check is always registered */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { salesStore, config, healthCheckers = [] } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  // Handlers are set before routes so registered plugins inherit them
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [makeSalesDataHealthChecker(salesStore), ...healthCheckers],
    })
  );

  await app.register(
    makeSalesRoutes({
      store: salesStore,
      defaults: {
        revenueField: config.sales.defaultRevenueField,
        geoClusterPrecision: config.sales.geoClusterPrecision,
      },
    })
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};

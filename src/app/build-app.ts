/**
 * Fastify application factory
 * Creates the HTTP transport: the streamable MCP endpoint plus health routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import {
  makeCredentialChecker,
  makeHealthRoutes,
  type HealthChecker,
} from '../modules/health/index.js';
import { INDICADORES_TOKEN_ENV } from '../modules/indicators/index.js';
import {
  createMcpServer,
  makeInMemorySessionStore,
  makeMcpRoutes,
  type McpSessionStore,
  type McpToolDeps,
} from '../modules/mcp/index.js';
import { DENUE_TOKEN_ENV } from '../modules/registry/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  tools: McpToolDeps;
  config: AppConfig;
  /** Defaults to one credential check per upstream API */
  healthCheckers?: HealthChecker[];
  /** Defaults to an in-memory store with the configured TTL */
  sessionStore?: McpSessionStore;
}

/** Readiness reports whether each upstream API has a token configured */
export const makeCredentialCheckers = (config: AppConfig): HealthChecker[] => [
  makeCredentialChecker({
    name: 'indicadores',
    token: config.indicadores.token,
    envVar: INDICADORES_TOKEN_ENV,
  }),
  makeCredentialChecker({
    name: 'denue',
    token: config.denue.token,
    envVar: DENUE_TOKEN_ENV,
  }),
];

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
 * This is the composition root of the HTTP transport
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { tools, config } = deps;

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Register health routes
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? makeCredentialCheckers(config),
    })
  );

  // Register MCP routes
  const sessionStore =
    deps.sessionStore ?? makeInMemorySessionStore({ ttlSeconds: config.mcp.sessionTtlSeconds });
  await makeMcpRoutes(app, {
    createServer: () => createMcpServer(tools),
    sessionStore,
    config: {
      authRequired: config.mcp.authRequired,
      sessionTtlSeconds: config.mcp.sessionTtlSeconds,
      ...(config.mcp.apiKey !== undefined && { apiKey: config.mcp.apiKey }),
    },
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

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

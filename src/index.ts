#!/usr/bin/env node
/**
 * Server entry point
 * Runs the MCP server over stdio (default) or streamable HTTP
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/env.js';
import { makeHttpClient } from './infra/http/client.js';
import { createChildLogger, createLogger } from './infra/logger/index.js';
import { INDICADORES_TOKEN_ENV, makeIndicatorsApi } from './modules/indicators/index.js';
import { runMcpServerStdio, SERVER_NAME, SERVER_VERSION } from './modules/mcp/index.js';
import { DENUE_TOKEN_ENV, makeDenueApi } from './modules/registry/index.js';

import type { McpToolDeps } from './modules/mcp/index.js';
import type { Logger } from 'pino';

const makeToolDeps = (config: AppConfig, logger: Logger): McpToolDeps => {
  const httpClient = makeHttpClient({
    logger: createChildLogger(logger, { component: 'http' }),
    timeoutMs: config.http.timeoutMs,
  });

  return {
    indicatorApi: makeIndicatorsApi({
      httpClient,
      baseUrl: config.indicadores.baseUrl,
      token: config.indicadores.token,
      language: config.indicadores.language,
      logger: createChildLogger(logger, { component: 'indicadores' }),
    }),
    registryApi: makeDenueApi({
      httpClient,
      baseUrl: config.denue.baseUrl,
      token: config.denue.token,
      logger: createChildLogger(logger, { component: 'denue' }),
    }),
    pageSize: config.denue.pageSize,
    logger: createChildLogger(logger, { component: 'tools' }),
  };
};

const warnMissingTokens = (config: AppConfig, logger: Logger): void => {
  if (config.indicadores.token === undefined) {
    logger.warn(`${INDICADORES_TOKEN_ENV} not set - indicator tools will fail`);
  }
  if (config.denue.token === undefined) {
    logger.warn(`${DENUE_TOKEN_ENV} not set - establishment tools will fail`);
  }
};

const startHttp = async (config: AppConfig, logger: Logger, tools: McpToolDeps): Promise<void> => {
  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: !config.server.isDevelopment,
    },
    deps: {
      tools,
      config,
    },
    version: SERVER_VERSION,
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  const address = await app.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info({ address }, 'MCP HTTP transport listening');
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);
  const isStdio = config.mcp.transport === 'stdio';

  // stdout carries the protocol in stdio mode
  const logger = createLogger({
    level: config.logger.level,
    name: SERVER_NAME,
    pretty: config.logger.pretty,
    destination: isStdio ? 2 : 1,
  });

  logger.info({ transport: config.mcp.transport }, 'Starting MCP server');
  warnMissingTokens(config, logger);

  const tools = makeToolDeps(config, logger);

  if (isStdio) {
    await runMcpServerStdio(tools);
    logger.info('MCP stdio transport connected');
    return;
  }

  await startHttp(config, logger, tools);
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

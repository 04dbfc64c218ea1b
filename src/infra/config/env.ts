/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_INDICADORES_BASE_URL =
  'https://www.inegi.org.mx/app/api/indicadores/desarrolladores/jsonxml';
export const DEFAULT_DENUE_BASE_URL = 'https://www.inegi.org.mx/app/api/denue/v1/consulta';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // MCP transport
  MCP_TRANSPORT: Type.Union([Type.Literal('stdio'), Type.Literal('http')], {
    default: 'stdio',
  }),
  MCP_API_KEY: Type.Optional(Type.String()),
  MCP_SESSION_TTL_SECONDS: Type.Integer({ default: 3600, minimum: 60, maximum: 86_400 }),

  // Upstream APIs
  INEGI_INDICADORES_TOKEN: Type.Optional(Type.String()),
  INEGI_DENUE_TOKEN: Type.Optional(Type.String()),
  INDICADORES_BASE_URL: Type.String({ minLength: 1 }),
  INDICADORES_LANGUAGE: Type.Union([Type.Literal('es'), Type.Literal('en')], { default: 'es' }),
  DENUE_BASE_URL: Type.String({ minLength: 1 }),
  DENUE_PAGE_SIZE: Type.Integer({ default: 1000, minimum: 1, maximum: 1000 }),
  HTTP_TIMEOUT_MS: Type.Integer({ default: 30_000, minimum: 100, maximum: 300_000 }),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;

const nonEmpty = (raw: string | undefined): string | undefined =>
  raw != null && raw.trim() !== '' ? raw.trim() : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseIntOr(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    MCP_TRANSPORT: env['MCP_TRANSPORT'] ?? 'stdio',
    MCP_API_KEY: nonEmpty(env['MCP_API_KEY']),
    MCP_SESSION_TTL_SECONDS: parseIntOr(env['MCP_SESSION_TTL_SECONDS'], 3600),
    INEGI_INDICADORES_TOKEN: nonEmpty(env['INEGI_INDICADORES_TOKEN']),
    // INEGI_TOKEN is the legacy single-token variable; it only ever covered the registry
    INEGI_DENUE_TOKEN: nonEmpty(env['INEGI_DENUE_TOKEN']) ?? nonEmpty(env['INEGI_TOKEN']),
    INDICADORES_BASE_URL: env['INDICADORES_BASE_URL'] ?? DEFAULT_INDICADORES_BASE_URL,
    INDICADORES_LANGUAGE: env['INDICADORES_LANGUAGE'] ?? 'es',
    DENUE_BASE_URL: env['DENUE_BASE_URL'] ?? DEFAULT_DENUE_BASE_URL,
    DENUE_PAGE_SIZE: parseIntOr(env['DENUE_PAGE_SIZE'], 1000),
    HTTP_TIMEOUT_MS: parseIntOr(env['HTTP_TIMEOUT_MS'], 30_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  mcp: {
    transport: env.MCP_TRANSPORT,
    /** Shared secret expected in the x-api-key header (HTTP transport only) */
    apiKey: env.MCP_API_KEY,
    authRequired: env.MCP_API_KEY !== undefined,
    sessionTtlSeconds: env.MCP_SESSION_TTL_SECONDS,
  },
  http: {
    timeoutMs: env.HTTP_TIMEOUT_MS,
  },
  indicadores: {
    baseUrl: env.INDICADORES_BASE_URL,
    token: env.INEGI_INDICADORES_TOKEN,
    language: env.INDICADORES_LANGUAGE,
  },
  denue: {
    baseUrl: env.DENUE_BASE_URL,
    token: env.INEGI_DENUE_TOKEN,
    pageSize: env.DENUE_PAGE_SIZE,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;

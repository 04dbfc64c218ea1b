/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import {
  DEFAULT_DENUE_BASE_URL,
  DEFAULT_INDICADORES_BASE_URL,
  createConfig,
  parseEnv,
} from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.MCP_TRANSPORT).toBe('stdio');
      expect(env.MCP_SESSION_TTL_SECONDS).toBe(3600);
      expect(env.INDICADORES_BASE_URL).toBe(DEFAULT_INDICADORES_BASE_URL);
      expect(env.INDICADORES_LANGUAGE).toBe('es');
      expect(env.DENUE_BASE_URL).toBe(DEFAULT_DENUE_BASE_URL);
      expect(env.DENUE_PAGE_SIZE).toBe(1000);
      expect(env.HTTP_TIMEOUT_MS).toBe(30_000);
    });

    it('parses numeric settings', () => {
      const env = parseEnv({
        PORT: '8080',
        DENUE_PAGE_SIZE: '250',
        HTTP_TIMEOUT_MS: '5000',
        MCP_SESSION_TTL_SECONDS: '600',
      });

      expect(env.PORT).toBe(8080);
      expect(env.DENUE_PAGE_SIZE).toBe(250);
      expect(env.HTTP_TIMEOUT_MS).toBe(5000);
      expect(env.MCP_SESSION_TTL_SECONDS).toBe(600);
    });

    it('treats blank tokens as missing', () => {
      const env = parseEnv({ INEGI_INDICADORES_TOKEN: '   ', INEGI_DENUE_TOKEN: '' });

      expect(env.INEGI_INDICADORES_TOKEN).toBeUndefined();
      expect(env.INEGI_DENUE_TOKEN).toBeUndefined();
    });

    it('trims configured tokens', () => {
      const env = parseEnv({ INEGI_INDICADORES_TOKEN: ' test-secret ' });

      expect(env.INEGI_INDICADORES_TOKEN).toBe('test-secret');
    });

    it('falls back to INEGI_TOKEN for the registry only', () => {
      const env = parseEnv({ INEGI_TOKEN: 'test-legacy' });

      expect(env.INEGI_DENUE_TOKEN).toBe('test-legacy');
      expect(env.INEGI_INDICADORES_TOKEN).toBeUndefined();
    });

    it('prefers INEGI_DENUE_TOKEN over INEGI_TOKEN', () => {
      const env = parseEnv({ INEGI_TOKEN: 'test-legacy', INEGI_DENUE_TOKEN: 'test-denue' });

      expect(env.INEGI_DENUE_TOKEN).toBe('test-denue');
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });

    it('throws on an unknown transport', () => {
      expect(() => parseEnv({ MCP_TRANSPORT: 'websocket' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on a page size above the registry maximum', () => {
      expect(() => parseEnv({ DENUE_PAGE_SIZE: '5000' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on a session TTL below one minute', () => {
      expect(() => parseEnv({ MCP_SESSION_TTL_SECONDS: '10' })).toThrow(
        'Invalid environment configuration'
      );
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);
      expect(devConfig.server.isTest).toBe(false);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.logger.pretty).toBe(false);
    });

    it('requires MCP auth only when an API key is set', () => {
      const open = createConfig(parseEnv({}));
      expect(open.mcp.authRequired).toBe(false);
      expect(open.mcp.apiKey).toBeUndefined();

      const locked = createConfig(parseEnv({ MCP_API_KEY: 'test-secret' }));
      expect(locked.mcp.authRequired).toBe(true);
      expect(locked.mcp.apiKey).toBe('test-secret');
    });

    it('groups upstream settings per API', () => {
      const config = createConfig(
        parseEnv({
          INEGI_INDICADORES_TOKEN: 'test-indicadores',
          INEGI_DENUE_TOKEN: 'test-denue',
          INDICADORES_LANGUAGE: 'en',
          DENUE_PAGE_SIZE: '100',
          HTTP_TIMEOUT_MS: '2000',
        })
      );

      expect(config.indicadores).toEqual({
        baseUrl: DEFAULT_INDICADORES_BASE_URL,
        token: 'test-indicadores',
        language: 'en',
      });
      expect(config.denue).toEqual({
        baseUrl: DEFAULT_DENUE_BASE_URL,
        token: 'test-denue',
        pageSize: 100,
      });
      expect(config.http.timeoutMs).toBe(2000);
    });
  });
});

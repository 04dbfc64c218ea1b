/**
 * Unit tests for MCP error mapping
 */

import { describe, expect, it } from 'vitest';

import {
  createAuthFailureError,
  createInvalidParameterError,
  createMalformedResponseError,
  createMissingCredentialError,
  createNotFoundError,
  createRateLimitedError,
  createUnsupportedScopeError,
  createUpstreamTimeoutError,
  createUpstreamUnavailableError,
} from '@/common/types/errors.js';
import { failedResult, successResult, toMcpError } from '@/modules/mcp/core/errors.js';

describe('toMcpError', () => {
  it('prefixes invalid parameters with the field name', () => {
    expect(toMcpError(createInvalidParameterError('limite', 'must be positive'))).toEqual({
      code: 'INVALID_INPUT',
      message: 'limite: must be positive',
    });
  });

  it('maps caller errors without a retry hint', () => {
    expect(toMcpError(createNotFoundError('indicator', 'zzz'))).toEqual({
      code: 'NOT_FOUND',
      message: "No indicator found matching 'zzz'",
    });
    expect(toMcpError(createUnsupportedScopeError('216906', 'state', ['national'])).code).toBe(
      'UNSUPPORTED_SCOPE'
    );
    expect(toMcpError(createMissingCredentialError('denue', 'INEGI_DENUE_TOKEN')).code).toBe(
      'MISSING_CREDENTIAL'
    );
    expect(toMcpError(createAuthFailureError('denue', 401)).code).toBe('UNAUTHORIZED');
    expect(toMcpError(createMalformedResponseError('denue', 'bad')).code).toBe(
      'MALFORMED_RESPONSE'
    );
  });

  it('marks transient upstream failures as retryable', () => {
    expect(toMcpError(createRateLimitedError('indicadores'))).toEqual({
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'The indicadores API is rate limiting requests (HTTP 429)',
      retryable: true,
    });
    expect(toMcpError(createUpstreamTimeoutError('denue', 30_000)).retryable).toBe(true);
    expect(toMcpError(createUpstreamUnavailableError('denue', 502, 'Bad Gateway'))).toEqual({
      code: 'UPSTREAM_UNAVAILABLE',
      message: 'The denue API failed with HTTP 502: Bad Gateway',
      retryable: true,
    });
  });
});

describe('result envelopes', () => {
  it('wraps data and errors', () => {
    expect(successResult({ total: 1 })).toEqual({ ok: true, data: { total: 1 } });
    expect(failedResult({ code: 'NOT_FOUND', message: 'x' })).toEqual({
      ok: false,
      error: { code: 'NOT_FOUND', message: 'x' },
    });
  });
});

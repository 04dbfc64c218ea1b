/**
 * MCP Module - Error Definitions
 *
 * Tool failures as seen by the calling agent: a stable code plus a short,
 * human-readable message.
 */

import type { QueryError } from '@/common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Interface
// ─────────────────────────────────────────────────────────────────────────────

/** MCP error structure (minimal for AI consumers) */
export interface McpError {
  readonly code: McpErrorCode;
  readonly message: string;
  /** Present when retrying the same call later may succeed */
  readonly retryable?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Codes
// ─────────────────────────────────────────────────────────────────────────────

export const MCP_ERROR_CODES = {
  // Lookup errors
  NOT_FOUND: 'NOT_FOUND',
  UNSUPPORTED_SCOPE: 'UNSUPPORTED_SCOPE',

  // Input validation errors
  INVALID_INPUT: 'INVALID_INPUT',

  // Upstream errors
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  UNAUTHORIZED: 'UNAUTHORIZED',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  TIMEOUT_ERROR: 'TIMEOUT_ERROR',
  UPSTREAM_UNAVAILABLE: 'UPSTREAM_UNAVAILABLE',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
} as const;

export type McpErrorCode = (typeof MCP_ERROR_CODES)[keyof typeof MCP_ERROR_CODES];

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createMcpError = (code: McpErrorCode, message: string): McpError => ({
  code,
  message,
});

export const invalidInputError = (reason: string): McpError =>
  createMcpError(MCP_ERROR_CODES.INVALID_INPUT, reason);

// ─────────────────────────────────────────────────────────────────────────────
// Query Error Mapping
// ─────────────────────────────────────────────────────────────────────────────

const retryable = (code: McpErrorCode, message: string): McpError => ({
  code,
  message,
  retryable: true,
});

/**
 * Maps a query error from the indicator or registry modules to an MCP error.
 */
export const toMcpError = (error: QueryError): McpError => {
  switch (error.type) {
    case 'NotFound':
      return createMcpError(MCP_ERROR_CODES.NOT_FOUND, error.message);
    case 'InvalidParameter':
      return createMcpError(MCP_ERROR_CODES.INVALID_INPUT, `${error.field}: ${error.message}`);
    case 'UnsupportedScope':
      return createMcpError(MCP_ERROR_CODES.UNSUPPORTED_SCOPE, error.message);
    case 'MissingCredential':
      return createMcpError(MCP_ERROR_CODES.MISSING_CREDENTIAL, error.message);
    case 'AuthFailure':
      return createMcpError(MCP_ERROR_CODES.UNAUTHORIZED, error.message);
    case 'RateLimited':
      return retryable(MCP_ERROR_CODES.RATE_LIMIT_EXCEEDED, error.message);
    case 'UpstreamTimeout':
      return retryable(MCP_ERROR_CODES.TIMEOUT_ERROR, error.message);
    case 'UpstreamUnavailable':
      return retryable(MCP_ERROR_CODES.UPSTREAM_UNAVAILABLE, error.message);
    case 'MalformedResponse':
      return createMcpError(MCP_ERROR_CODES.MALFORMED_RESPONSE, error.message);
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Result Envelopes
// ─────────────────────────────────────────────────────────────────────────────

export interface FailedToolResult {
  readonly ok: false;
  readonly error: McpError;
}

export interface SuccessToolResult<T> {
  readonly ok: true;
  readonly data: T;
}

/** Builds a failed MCP tool response */
export const failedResult = (error: McpError): FailedToolResult => ({
  ok: false,
  error,
});

/** Builds a successful MCP tool response */
export const successResult = <T>(data: T): SuccessToolResult<T> => ({
  ok: true,
  data,
});

/**
 * Query error taxonomy shared by every upstream-facing module.
 *
 * Errors are plain values carried in neverthrow `Result`s. Nothing in the core
 * throws for an expected failure, and no failure is retried internally.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Upstream APIs
// ─────────────────────────────────────────────────────────────────────────────

/** Upstream APIs the server talks to */
export type UpstreamApi = 'indicadores' | 'denue';

// ─────────────────────────────────────────────────────────────────────────────
// Caller / Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface NotFoundError {
  readonly type: 'NotFound';
  readonly message: string;
  readonly resource: string;
  readonly query: string;
}

export interface InvalidParameterError {
  readonly type: 'InvalidParameter';
  readonly message: string;
  readonly field: string;
}

export interface UnsupportedScopeError {
  readonly type: 'UnsupportedScope';
  readonly message: string;
  readonly indicatorCode: string;
  readonly level: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Upstream Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface MissingCredentialError {
  readonly type: 'MissingCredential';
  readonly message: string;
  readonly api: UpstreamApi;
}

export interface AuthFailureError {
  readonly type: 'AuthFailure';
  readonly message: string;
  readonly api: UpstreamApi;
  readonly status: number;
}

export interface RateLimitedError {
  readonly type: 'RateLimited';
  readonly message: string;
  readonly api: UpstreamApi;
  readonly retryable: true;
}

export interface UpstreamTimeoutError {
  readonly type: 'UpstreamTimeout';
  readonly message: string;
  readonly api: UpstreamApi;
  readonly timeoutMs: number;
  readonly retryable: true;
}

export interface UpstreamUnavailableError {
  readonly type: 'UpstreamUnavailable';
  readonly message: string;
  readonly api: UpstreamApi;
  readonly status: number | null;
  readonly retryable: true;
  readonly cause?: unknown;
}

export interface MalformedResponseError {
  readonly type: 'MalformedResponse';
  readonly message: string;
  readonly api: UpstreamApi;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type QueryError =
  | NotFoundError
  | InvalidParameterError
  | UnsupportedScopeError
  | MissingCredentialError
  | AuthFailureError
  | RateLimitedError
  | UpstreamTimeoutError
  | UpstreamUnavailableError
  | MalformedResponseError;

export type QueryErrorType = QueryError['type'];

// ─────────────────────────────────────────────────────────────────────────────
// Warnings (non-fatal)
// ─────────────────────────────────────────────────────────────────────────────

export type WarningKind =
  | 'TotalMismatch'
  | 'ReportedTotalUnavailable'
  | 'CountTruncated'
  | 'PartialResults';

/** Non-fatal data inconsistency attached to a successful result */
export interface Warning {
  readonly type: 'Warning';
  readonly kind: WarningKind;
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNotFoundError = (
  resource: string,
  query: string,
  message?: string
): NotFoundError => ({
  type: 'NotFound',
  message: message ?? `No ${resource} found matching '${query}'`,
  resource,
  query,
});

export const createInvalidParameterError = (
  field: string,
  message: string
): InvalidParameterError => ({
  type: 'InvalidParameter',
  message,
  field,
});

export const createUnsupportedScopeError = (
  indicatorCode: string,
  level: string,
  supported: readonly string[]
): UnsupportedScopeError => ({
  type: 'UnsupportedScope',
  message: `Indicator '${indicatorCode}' is not published at ${level} level (available: ${supported.join(', ')})`,
  indicatorCode,
  level,
});

export const createMissingCredentialError = (
  api: UpstreamApi,
  envVar: string
): MissingCredentialError => ({
  type: 'MissingCredential',
  message: `No access token configured for the ${api} API. Set ${envVar}.`,
  api,
});

export const createAuthFailureError = (api: UpstreamApi, status: number): AuthFailureError => ({
  type: 'AuthFailure',
  message: `The ${api} API rejected the access token (HTTP ${String(status)})`,
  api,
  status,
});

export const createRateLimitedError = (api: UpstreamApi): RateLimitedError => ({
  type: 'RateLimited',
  message: `The ${api} API is rate limiting requests (HTTP 429)`,
  api,
  retryable: true,
});

export const createUpstreamTimeoutError = (
  api: UpstreamApi,
  timeoutMs: number
): UpstreamTimeoutError => ({
  type: 'UpstreamTimeout',
  message: `The ${api} API did not answer within ${String(timeoutMs)} ms`,
  api,
  timeoutMs,
  retryable: true,
});

export const createUpstreamUnavailableError = (
  api: UpstreamApi,
  status: number | null,
  detail: string,
  cause?: unknown
): UpstreamUnavailableError => ({
  type: 'UpstreamUnavailable',
  message:
    status !== null
      ? `The ${api} API failed with HTTP ${String(status)}: ${detail}`
      : `The ${api} API is unreachable: ${detail}`,
  api,
  status,
  retryable: true,
  cause,
});

export const createMalformedResponseError = (
  api: UpstreamApi,
  detail: string,
  cause?: unknown
): MalformedResponseError => ({
  type: 'MalformedResponse',
  message: `The ${api} API returned an unexpected payload: ${detail}`,
  api,
  cause,
});

export const createWarning = (kind: WarningKind, message: string): Warning => ({
  type: 'Warning',
  kind,
  message,
});

/** Upstream failures worth a warn-level log line */
export const isUpstreamError = (error: QueryError): boolean =>
  error.type === 'AuthFailure' ||
  error.type === 'RateLimited' ||
  error.type === 'UpstreamTimeout' ||
  error.type === 'UpstreamUnavailable' ||
  error.type === 'MalformedResponse';

/**
 * HTTP Transport Adapter
 *
 * Issues GET requests against the upstream statistical APIs, injects the
 * per-API access token, enforces a per-call timeout and maps HTTP outcomes
 * to the shared query error taxonomy. No retries.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createAuthFailureError,
  createInvalidParameterError,
  createMalformedResponseError,
  createMissingCredentialError,
  createNotFoundError,
  createRateLimitedError,
  createUpstreamTimeoutError,
  createUpstreamUnavailableError,
  type QueryError,
  type UpstreamApi,
} from '@/common/types/errors.js';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Where an API expects its access token */
export type TokenPlacement = { kind: 'path' } | { kind: 'query'; param: string };

export interface Credential {
  readonly api: UpstreamApi;
  readonly token: string | undefined;
  readonly placement: TokenPlacement;
  /** Environment variable that supplies the token, named in MissingCredential errors */
  readonly envVar: string;
}

export interface HttpRequest {
  readonly baseUrl: string;
  readonly pathSegments: readonly string[];
  readonly query?: Readonly<Record<string, string>>;
  readonly credential: Credential;
}

/** Minimal response surface the adapter needs from `fetch` */
export interface FetchResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  text(): Promise<string>;
}

export type FetchFn = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchResponse>;

export interface HttpClient {
  getJson(request: HttpRequest): Promise<Result<unknown, QueryError>>;
}

export interface HttpClientDeps {
  logger: Logger;
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

// ─────────────────────────────────────────────────────────────────────────────
// URL Building
// ─────────────────────────────────────────────────────────────────────────────

const REDACTED = '***';
const BODY_SNIPPET_LENGTH = 200;

/**
 * Percent-encodes a path segment. Commas stay literal: the registry API
 * takes `lat,lon` pairs as a single segment.
 */
export const encodeSegment = (segment: string): string =>
  encodeURIComponent(segment).replace(/%2C/gi, ',');

/**
 * Builds the request URL, placing the token where the API expects it.
 */
export const buildUrl = (request: HttpRequest, token: string): string => {
  const base = request.baseUrl.replace(/\/+$/, '');
  const segments = [...request.pathSegments];
  const query = new URLSearchParams(request.query ?? {});

  const placement = request.credential.placement;
  if (placement.kind === 'path') {
    segments.push(token);
  } else {
    query.set(placement.param, token);
  }

  const path = segments.map(encodeSegment).join('/');
  const queryString = query.toString();
  return queryString === '' ? `${base}/${path}` : `${base}/${path}?${queryString}`;
};

const isTimeoutFailure = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

const snippet = (body: string): string => {
  const compact = body.replace(/\s+/g, ' ').trim();
  return compact.length > BODY_SNIPPET_LENGTH
    ? `${compact.slice(0, BODY_SNIPPET_LENGTH)}...`
    : compact;
};

/**
 * Maps a non-2xx status to the error taxonomy.
 */
export const mapHttpStatus = (
  api: UpstreamApi,
  status: number,
  statusText: string,
  body: string,
  resource: string
): QueryError => {
  if (status === 401 || status === 403) {
    return createAuthFailureError(api, status);
  }
  if (status === 404) {
    return createNotFoundError(resource, resource, `The ${api} API has no resource at '${resource}'`);
  }
  if (status === 429) {
    return createRateLimitedError(api);
  }
  if (status === 400 || status === 422) {
    const detail = snippet(body);
    return createInvalidParameterError(
      'request',
      `The ${api} API rejected the request (HTTP ${String(status)})${detail !== '' ? `: ${detail}` : ''}`
    );
  }
  return createUpstreamUnavailableError(api, status, statusText !== '' ? statusText : snippet(body));
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the shared HTTP transport adapter.
 */
export const makeHttpClient = (deps: HttpClientDeps): HttpClient => {
  const fetchFn: FetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
  const { logger, timeoutMs } = deps;

  return {
    async getJson(request: HttpRequest): Promise<Result<unknown, QueryError>> {
      const { credential } = request;
      const token = credential.token?.trim() ?? '';
      if (token === '') {
        return err(createMissingCredentialError(credential.api, credential.envVar));
      }

      const url = buildUrl(request, token);
      const logUrl = buildUrl(request, REDACTED);
      const resource = request.pathSegments[0] ?? '';
      const startedAt = Date.now();

      let response: FetchResponse;
      let body: string;
      try {
        response = await fetchFn(url, {
          method: 'GET',
          headers: { accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs),
        });
        body = await response.text();
      } catch (error) {
        if (isTimeoutFailure(error)) {
          logger.warn({ api: credential.api, url: logUrl, timeoutMs }, 'Upstream request timed out');
          return err(createUpstreamTimeoutError(credential.api, timeoutMs));
        }
        const detail = error instanceof Error ? error.message : String(error);
        logger.warn({ api: credential.api, url: logUrl, err: detail }, 'Upstream request failed');
        return err(createUpstreamUnavailableError(credential.api, null, detail, error));
      }

      logger.debug(
        { api: credential.api, url: logUrl, status: response.status, ms: Date.now() - startedAt },
        'Upstream request completed'
      );

      if (!response.ok) {
        return err(
          mapHttpStatus(credential.api, response.status, response.statusText, body, resource)
        );
      }

      try {
        const parsed: unknown = JSON.parse(body);
        return ok(parsed);
      } catch (error) {
        return err(
          createMalformedResponseError(credential.api, `body is not valid JSON (${snippet(body)})`, error)
        );
      }
    },
  };
};

/**
 * Fake implementations for testing
 * In-process stand-ins for the upstream APIs; they record every call
 */

import { err, ok, type Result } from 'neverthrow';

import { createNotFoundError, type QueryError } from '@/common/types/errors.js';
import { createSilentLogger } from '@/infra/logger/index.js';

import type { FetchFn, FetchResponse } from '@/infra/http/client.js';
import type {
  CatalogEntry,
  IndicatorApi,
  RawSeries,
  SeriesRequest,
} from '@/modules/indicators/index.js';
import type { McpToolDeps } from '@/modules/mcp/index.js';
import type {
  Establishment,
  PageWindow,
  QuantifyRequest,
  QuantifyResult,
  RadiusQuery,
  RegistryApi,
  RegistryPage,
  RegistryQuery,
} from '@/modules/registry/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Indicator API
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeIndicatorApiOptions {
  /** Keyed by `${code}@${area}`; missing keys answer NotFound */
  series?: Record<string, Result<RawSeries, QueryError>>;
  catalog?: CatalogEntry[];
  /** Error returned by listCatalog and lookupCatalogEntry */
  catalogError?: QueryError;
  units?: Record<string, string>;
  frequencies?: Record<string, string>;
}

export interface FakeIndicatorApi extends IndicatorApi {
  readonly seriesRequests: SeriesRequest[];
  readonly catalogLookups: string[];
  listCatalogCalls: number;
}

export const makeFakeIndicatorApi = (options: FakeIndicatorApiOptions = {}): FakeIndicatorApi => {
  const catalog = options.catalog ?? [];

  const fake: FakeIndicatorApi = {
    seriesRequests: [],
    catalogLookups: [],
    listCatalogCalls: 0,

    async fetchSeries(request) {
      fake.seriesRequests.push(request);
      const key = `${request.code}@${request.area}`;
      return (
        options.series?.[key] ??
        err(createNotFoundError('series', key, `No data for indicator '${request.code}'`))
      );
    },

    async lookupCatalogEntry(code) {
      fake.catalogLookups.push(code);
      if (options.catalogError !== undefined) {
        return err(options.catalogError);
      }
      return ok(catalog.find((entry) => entry.code === code) ?? null);
    },

    async listCatalog() {
      fake.listCatalogCalls += 1;
      if (options.catalogError !== undefined) {
        return err(options.catalogError);
      }
      return ok([...catalog]);
    },

    async describeUnit(unitCode) {
      return ok(options.units?.[unitCode] ?? null);
    },

    async describeFrequency(frequencyCode) {
      return ok(options.frequencies?.[frequencyCode] ?? null);
    },
  };

  return fake;
};

// ─────────────────────────────────────────────────────────────────────────────
// Registry API
// ─────────────────────────────────────────────────────────────────────────────

export interface RegistryCall {
  query: RegistryQuery;
  window: PageWindow;
}

export type PageHandler = (
  query: RegistryQuery,
  window: PageWindow,
  callIndex: number
) => Result<RegistryPage, QueryError>;

export interface FakeRegistryApiOptions {
  pages?: PageHandler;
  /** Whole-radius answer; defaults to no establishments */
  radius?: (query: RadiusQuery) => Result<Establishment[], QueryError>;
  /** Establishments served by id; other ids answer null */
  establishments?: Establishment[];
  quantify?: (request: QuantifyRequest) => Result<QuantifyResult, QueryError>;
}

export interface FakeRegistryApi extends RegistryApi {
  readonly calls: RegistryCall[];
  readonly radiusCalls: RadiusQuery[];
  readonly establishmentCalls: string[];
  readonly quantifyCalls: QuantifyRequest[];
}

const emptyPage: PageHandler = () => ok({ items: [], totalAvailable: null });

export const makeFakeRegistryApi = (options: FakeRegistryApiOptions = {}): FakeRegistryApi => {
  const pages = options.pages ?? emptyPage;

  const fake: FakeRegistryApi = {
    calls: [],
    radiusCalls: [],
    establishmentCalls: [],
    quantifyCalls: [],

    async fetchPage(query, window) {
      const callIndex = fake.calls.length;
      fake.calls.push({ query, window });
      return pages(query, window, callIndex);
    },

    async fetchRadius(query) {
      fake.radiusCalls.push(query);
      return options.radius?.(query) ?? ok([]);
    },

    async fetchEstablishment(id) {
      fake.establishmentCalls.push(id);
      return ok(options.establishments?.find((establishment) => establishment.id === id) ?? null);
    },

    async quantify(request) {
      fake.quantifyCalls.push(request);
      return options.quantify?.(request) ?? ok({ total: 0, rows: [] });
    },
  };

  return fake;
};

// ─────────────────────────────────────────────────────────────────────────────
// Tool dependencies
// ─────────────────────────────────────────────────────────────────────────────

export const makeFakeToolDeps = (overrides: Partial<McpToolDeps> = {}): McpToolDeps => ({
  indicatorApi: makeFakeIndicatorApi(),
  registryApi: makeFakeRegistryApi(),
  pageSize: 1000,
  logger: createSilentLogger(),
  ...overrides,
});

// ─────────────────────────────────────────────────────────────────────────────
// fetch
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeResponse {
  status?: number;
  statusText?: string;
  body?: string;
}

export interface RecordingFetch {
  fetch: FetchFn;
  readonly urls: string[];
}

/**
 * fetch stand-in answering each call with the next response; a thrown
 * Error entry is thrown instead.
 */
export const makeRecordingFetch = (responses: (FakeResponse | Error)[]): RecordingFetch => {
  const urls: string[] = [];
  let index = 0;

  const fetchFn: FetchFn = async (url) => {
    urls.push(url);
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (next === undefined) {
      throw new Error('No fake response configured');
    }
    if (next instanceof Error) {
      throw next;
    }
    const status = next.status ?? 200;
    const response: FetchResponse = {
      ok: status >= 200 && status < 300,
      status,
      statusText: next.statusText ?? '',
      text: async () => next.body ?? '',
    };
    return response;
  };

  return { fetch: fetchFn, urls };
};

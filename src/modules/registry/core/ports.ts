/**
 * Port interfaces for the registry module.
 */

import type {
  Establishment,
  PageWindow,
  QuantifyRequest,
  QuantifyResult,
  RadiusQuery,
  RegistryPage,
  RegistryQuery,
} from './types.js';
import type { QueryError } from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Registry API
// ─────────────────────────────────────────────────────────────────────────────

export interface RegistryApi {
  /**
   * One window of a query's results. `totalAvailable` is null when the
   * endpoint does not report a total.
   */
  fetchPage(query: RegistryQuery, window: PageWindow): Promise<Result<RegistryPage, QueryError>>;

  /**
   * Every establishment within a radius. The registry answers a radius in
   * one piece; callers slice it.
   */
  fetchRadius(query: RadiusQuery): Promise<Result<Establishment[], QueryError>>;

  /** One establishment by registry id; null when there is none */
  fetchEstablishment(id: string): Promise<Result<Establishment | null, QueryError>>;

  /**
   * Establishment counts the registry reports for an activity, an area and
   * a size band, one row per activity and area.
   */
  quantify(request: QuantifyRequest): Promise<Result<QuantifyResult, QueryError>>;
}

/** Dependencies shared by the search use cases */
export interface RegistrySearchDeps {
  registryApi: RegistryApi;
  /** Records per upstream request, clamped to MAX_PAGE_SIZE */
  pageSize: number;
}

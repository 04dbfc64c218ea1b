/**
 * Port interfaces for the indicators module.
 */

import type { CatalogEntry } from './types.js';
import type { QueryError } from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Indicator API
// ─────────────────────────────────────────────────────────────────────────────

export interface SeriesRequest {
  code: string;
  /** Upstream area code: '00', 'SS000' or 'SSMMM' */
  area: string;
  latestOnly: boolean;
}

export interface RawObservation {
  readonly period: string;
  readonly value: number | null;
}

/**
 * One upstream series, observations in upstream order.
 * Unit and frequency are upstream catalog codes, not labels.
 */
export interface RawSeries {
  readonly observations: readonly RawObservation[];
  readonly unitCode: string | null;
  readonly frequencyCode: string | null;
  readonly unitMultiplier: string | null;
  readonly topic: string | null;
  readonly source: string | null;
  readonly note: string | null;
  readonly lastUpdate: string | null;
}

export interface IndicatorApi {
  /** NotFound when the upstream has no series for the code and area */
  fetchSeries(request: SeriesRequest): Promise<Result<RawSeries, QueryError>>;

  /** Single catalog row by code; null when the catalog does not know it */
  lookupCatalogEntry(code: string): Promise<Result<CatalogEntry | null, QueryError>>;

  /** The full indicator catalog */
  listCatalog(): Promise<Result<CatalogEntry[], QueryError>>;

  describeUnit(unitCode: string): Promise<Result<string | null, QueryError>>;

  describeFrequency(frequencyCode: string): Promise<Result<string | null, QueryError>>;
}

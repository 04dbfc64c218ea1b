/**
 * Indicators Module - Core Types
 */

import type { QueryError } from '@/common/types/errors.js';
import type { GeoLevel, GeoScope } from '@/common/types/geo.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Upstream indicator identifiers are numeric */
export const INDICATOR_CODE_PATTERN = /^\d{4,12}$/;

export const DEFAULT_CATALOG_CANDIDATES = 10;
export const MAX_CATALOG_CANDIDATES = 50;

/** Concurrent upstream calls per comparison batch */
export const COMPARE_CONCURRENCY = 4;
export const MAX_COMPARE_SCOPES = 32;

export type IndicatorLanguage = 'es' | 'en';

// ─────────────────────────────────────────────────────────────────────────────
// Indicator
// ─────────────────────────────────────────────────────────────────────────────

export type Periodicity = 'annual' | 'quarterly' | 'monthly';

export interface IndicatorRef {
  readonly code: string;
  readonly name: string;
  readonly unit: string;
  readonly periodicity: Periodicity;
  readonly coverageLevels: readonly GeoLevel[];
}

/** Curated table row: an indicator plus its browsing category */
export interface CuratedIndicator extends IndicatorRef {
  readonly category: string;
}

/** One row of the upstream indicator catalog */
export interface CatalogEntry {
  readonly code: string;
  readonly name: string;
}

export interface IndicatorCandidate {
  readonly code: string;
  readonly name: string;
  /** Fuse.js distance (0 = exact); null for curated-table matches */
  readonly score: number | null;
}

export type ResolutionSource = 'curated' | 'catalog';

export interface IndicatorResolution {
  readonly indicator: IndicatorRef;
  readonly source: ResolutionSource;
  /** Every candidate considered, best first; the first one is `indicator` */
  readonly candidates: readonly IndicatorCandidate[];
}

export interface IndicatorMetadata {
  readonly code: string;
  readonly name: string;
  readonly unit: string | null;
  readonly unitMultiplier: string | null;
  readonly frequency: string | null;
  readonly topic: string | null;
  readonly source: string | null;
  readonly lastUpdate: string | null;
  readonly note: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Time Series
// ─────────────────────────────────────────────────────────────────────────────

export interface SeriesPoint {
  readonly period: string;
  /** null marks upstream "no data", distinct from zero */
  readonly value: number | null;
}

export interface TimeSeries {
  readonly indicator: IndicatorRef;
  readonly scope: GeoScope;
  /** Chronologically ascending, unique periods */
  readonly points: readonly SeriesPoint[];
  readonly lastUpdate: string | null;
  readonly source: string | null;
}

export interface FetchTimeSeriesInput {
  indicator: IndicatorRef;
  scope: GeoScope;
  historical: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Comparison
// ─────────────────────────────────────────────────────────────────────────────

export interface ComparisonEntry {
  readonly scope: GeoScope;
  readonly result: Result<TimeSeries, QueryError>;
}

export interface ComparisonRankRow {
  readonly rank: number;
  readonly scope: GeoScope;
  readonly period: string;
  readonly value: number;
}

export interface StateComparison {
  readonly indicator: IndicatorRef;
  /** Same order as the requested scopes */
  readonly entries: readonly ComparisonEntry[];
  /** Scopes with a latest non-null value, highest first */
  readonly ranking: readonly ComparisonRankRow[];
}

export interface CompareStatesInput {
  indicator: IndicatorRef;
  scopes: readonly GeoScope[];
  historical?: boolean;
}

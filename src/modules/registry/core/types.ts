/**
 * Registry Module - Core Types
 */

import type { QueryError, Warning } from '@/common/types/errors.js';
import type { GeoScope } from '@/common/types/geo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Upper bound the registry accepts for one record window */
export const MAX_PAGE_SIZE = 1000;

export const MAX_SEARCH_LIMIT = 5000;
export const DEFAULT_SEARCH_LIMIT = 10;

export const MAX_RADIUS_METERS = 5000;
export const DEFAULT_RADIUS_METERS = 250;

/** Term the registry treats as "any establishment" in radius searches */
export const ANY_TERM = 'todos';

/** Records a single count may page through before giving up */
export const MAX_COUNT_RECORDS = 50_000;

/** Registry identifiers of single establishments are numeric */
export const ESTABLISHMENT_ID_PATTERN = /^\d{1,20}$/;

/** Employee-count bands, keyed by the code the quantify endpoint takes */
export const STRATA = {
  '1': '0 a 5 personas',
  '2': '6 a 10 personas',
  '3': '11 a 30 personas',
  '4': '31 a 50 personas',
  '5': '51 a 100 personas',
  '6': '101 a 250 personas',
  '7': '251 y más personas',
} as const;

/** '0' is every band */
export type StratumCode = '0' | keyof typeof STRATA;

export const ALL_STRATA: '0' = '0';

// ─────────────────────────────────────────────────────────────────────────────
// Establishment
// ─────────────────────────────────────────────────────────────────────────────

export interface Coordinates {
  readonly lat: number;
  readonly lon: number;
}

export interface Establishment {
  readonly id: string;
  readonly name: string;
  /** Six-digit class code; null where the endpoint only returns the description */
  readonly activityCode: string | null;
  readonly activityDescription: string;
  /** Classification above the class, as the registry reports it */
  readonly sectorCode: string | null;
  readonly subsectorCode: string | null;
  readonly ramaCode: string | null;
  readonly address: string;
  /** Null when either coordinate is missing or non-numeric, never (0, 0) */
  readonly coordinates: Coordinates | null;
  readonly ageb: string | null;
  readonly manzana: string | null;
  readonly phone: string | null;
  readonly email: string | null;
  readonly website: string | null;
  readonly postalCode: string | null;
  /** Employee-count band as labelled upstream */
  readonly stratum: string | null;
}

export interface EstablishmentPage {
  readonly items: readonly Establishment[];
  readonly totalAvailable: number | null;
  readonly hasMore: boolean;
  readonly pagesFetched: number;
  /** First failure after at least one good page; items hold what came before it */
  readonly failure: QueryError | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export type ActivityLevel = 'sector' | 'subsector' | 'rama' | 'clase';

export interface ActivityCode {
  readonly level: ActivityLevel;
  readonly code: string;
}

export interface TermQuery {
  readonly kind: 'term';
  readonly term: string;
  /** '00' searches every state */
  readonly stateCode: string;
}

export interface RadiusQuery {
  readonly kind: 'radius';
  readonly term: string;
  readonly lat: number;
  readonly lon: number;
  readonly radiusMeters: number;
}

export interface ActivityAreaQuery {
  readonly kind: 'activity-area';
  /** '00' for the whole country */
  readonly stateCode: string;
  /** Three digits, or '0' for every municipality */
  readonly municipalityCode: string;
  /** null matches every activity */
  readonly activity: ActivityCode | null;
  /** '0' matches every name */
  readonly name: string;
}

/** Queries answered one record window at a time */
export type RegistryQuery = TermQuery | ActivityAreaQuery;

/** Zero-based record window */
export interface PageWindow {
  readonly offset: number;
  readonly count: number;
}

export interface RegistryPage {
  readonly items: readonly Establishment[];
  readonly totalAvailable: number | null;
}

export interface QuantifyRequest {
  /** Activity code, or '0' for every activity */
  readonly activityCode: string;
  /** '0', 'SS' or 'SSMMM' */
  readonly areaCode: string;
  readonly stratum: StratumCode;
}

/** One row of the registry's count, per activity and area */
export interface QuantifyRow {
  readonly activityCode: string;
  readonly areaCode: string;
  readonly total: number;
}

export interface QuantifyResult {
  /** Sum of every row */
  readonly total: number;
  readonly rows: readonly QuantifyRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface SearchByTermInput {
  term: string;
  scope?: GeoScope;
  limit: number;
}

export interface SearchByRadiusInput {
  lat: number;
  lon: number;
  radiusMeters: number;
  limit: number;
  term?: string;
}

export interface SearchByActivityAndAreaInput {
  activityCode: string;
  scope: GeoScope;
  limit: number;
  name?: string;
}

export interface CountBySectorInput {
  activityCode: string;
  scope: GeoScope;
  /** Defaults to every band */
  stratum?: StratumCode;
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

export interface SectorCount {
  /** Activity code counted; '0' for every activity */
  readonly sectorCode: string;
  readonly area: GeoScope;
  readonly stratum: StratumCode;
  readonly count: number;
  readonly reportedTotal: number | null;
  /** The registry's rows behind reportedTotal; empty when it is unavailable */
  readonly breakdown: readonly QuantifyRow[];
  readonly warnings: readonly Warning[];
  readonly truncated: boolean;
}

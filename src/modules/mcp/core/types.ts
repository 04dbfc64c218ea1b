/**
 * MCP Module - Core Types
 *
 * Tool inputs, tool outputs and transport configuration.
 */

import type { GeoLevel } from '@/common/types/geo.js';
import type { Periodicity } from '@/modules/indicators/index.js';
import type { StratumCode } from '@/modules/registry/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

export interface McpSession {
  id: string;
  createdAt: number;
  lastAccessedAt: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/** MCP module configuration */
export interface McpConfig {
  /** Require the x-api-key header on the HTTP transport */
  authRequired: boolean;
  /** Static API key for simple authentication */
  apiKey?: string;
  /** Idle time after which an HTTP session is dropped */
  sessionTtlSeconds: number;
}

/** Default MCP configuration */
export const DEFAULT_MCP_CONFIG: McpConfig = {
  authRequired: false,
  sessionTtlSeconds: 3600,
};

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default `limite` for establishment searches */
export const DEFAULT_TOOL_LIMIT = 10;

/** Default `limite` for coordinate lookups */
export const DEFAULT_COORDINATES_LIMIT = 5;

// ─────────────────────────────────────────────────────────────────────────────
// Tool Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface SearchIndicatorsInput {
  keyword: string;
}

export interface SearchFullCatalogToolInput {
  keyword: string;
  limite?: number | undefined;
}

export interface GetTimeSeriesInput {
  indicador_id: string;
  historica: boolean;
  codigo_geo?: string | undefined;
}

export interface CompareStatesToolInput {
  indicador_id: string;
  estados: string[];
  historica?: boolean | undefined;
}

export interface GetIndicatorMetadataInput {
  indicador_id: string;
}

export interface SearchEstablishmentsInput {
  termino: string;
  limite: number;
  entidad?: string | undefined;
  latitud?: number | undefined;
  longitud?: number | undefined;
  radio?: number | undefined;
}

export interface SearchActivityAreaInput {
  entidad: string;
  municipio: string;
  nombre: string;
  limite: number;
  clase?: string | undefined;
}

export interface CountEstablishmentsInput {
  actividad_economica: string;
  area_geografica: string;
  estrato: string;
}

export interface GetEstablishmentInput {
  id_establecimiento: string;
}

export interface GetCoordinatesInput {
  termino: string;
  limite: number;
  latitud?: number | undefined;
  longitud?: number | undefined;
  radio?: number | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tool Outputs
// ─────────────────────────────────────────────────────────────────────────────

export interface ScopeOutput {
  level: GeoLevel;
  code: string;
  name: string;
}

export interface IndicatorOutput {
  code: string;
  name: string;
  unit: string;
  periodicity: Periodicity;
  coverageLevels: GeoLevel[];
  category?: string;
}

export interface CandidateOutput {
  code: string;
  name: string;
  score: number | null;
}

export interface SearchIndicatorsOutput {
  keyword: string;
  total: number;
  indicators: IndicatorOutput[];
  /** Filled only when nothing matched: the whole curated list */
  suggestions: { code: string; name: string }[];
}

export interface SearchFullCatalogOutput {
  keyword: string;
  total: number;
  candidates: CandidateOutput[];
}

export interface PointOutput {
  period: string;
  value: number | null;
}

export interface TimeSeriesOutput {
  indicator: IndicatorOutput;
  resolvedFrom: 'curated' | 'catalog';
  candidates: CandidateOutput[];
  scope: ScopeOutput;
  lastUpdate: string | null;
  source: string | null;
  observationCount: number;
  latest: { period: string; value: number } | null;
  points: PointOutput[];
}

export type ComparisonEntryOutput =
  | {
      state: ScopeOutput;
      ok: true;
      latest: { period: string; value: number } | null;
      points: PointOutput[];
    }
  | {
      state: ScopeOutput;
      ok: false;
      error: { code: string; message: string };
    };

export interface CompareStatesOutput {
  indicator: IndicatorOutput;
  entries: ComparisonEntryOutput[];
  ranking: { rank: number; state: ScopeOutput; period: string; value: number }[];
  failed: number;
}

export interface IndicatorMetadataOutput {
  code: string;
  name: string;
  unit: string | null;
  unitMultiplier: string | null;
  frequency: string | null;
  topic: string | null;
  source: string | null;
  lastUpdate: string | null;
  note: string | null;
}

export interface ListIndicatorsOutput {
  total: number;
  categories: { category: string; indicators: IndicatorOutput[] }[];
}

export interface EstablishmentOutput {
  id: string;
  name: string;
  activityCode: string | null;
  activity: string;
  sectorCode: string | null;
  subsectorCode: string | null;
  ramaCode: string | null;
  address: string;
  coordinates: { lat: number; lon: number } | null;
  ageb: string | null;
  manzana: string | null;
  phone: string | null;
  email: string | null;
  website: string | null;
  postalCode: string | null;
  stratum: string | null;
}

export interface EstablishmentsOutput {
  mode: 'term' | 'radius' | 'activity-area';
  returned: number;
  totalAvailable: number | null;
  hasMore: boolean;
  /** A page failure after some records were already retrieved */
  partialFailure: { code: string; message: string } | null;
  establishments: EstablishmentOutput[];
}

export interface CoordinatesOutput {
  mode: 'term' | 'radius';
  returned: number;
  withoutCoordinates: number;
  hasMore: boolean;
  partialFailure: { code: string; message: string } | null;
  establishments: {
    id: string;
    name: string;
    address: string;
    coordinates: { lat: number; lon: number } | null;
  }[];
}

export interface CountEstablishmentsOutput {
  activityCode: string;
  area: ScopeOutput;
  /** Size band code and label; '0' is every band */
  stratum: { code: StratumCode; label: string };
  count: number;
  reportedTotal: number | null;
  /** The registry's count per activity and area */
  breakdown: { activityCode: string; areaCode: string; total: number }[];
  truncated: boolean;
  warnings: { kind: string; message: string }[];
}

export interface EstablishmentDetailOutput {
  establishment: EstablishmentOutput;
}

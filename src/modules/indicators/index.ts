/**
 * Indicators Module - Public API
 */

// =============================================================================
// Adapter
// =============================================================================
export {
  makeIndicatorsApi,
  INDICADORES_TOKEN_ENV,
  type IndicatorsApiDeps,
} from './shell/repo/indicators-api.js';
export type { IndicatorApi, RawSeries, RawObservation, SeriesRequest } from './core/ports.js';

// =============================================================================
// Use Cases
// =============================================================================
export { resolveIndicator } from './core/usecases/resolve-indicator.js';
export { searchCuratedIndicators } from './core/usecases/search-curated-indicators.js';
export { searchFullCatalog } from './core/usecases/search-full-catalog.js';
export {
  listCuratedIndicators,
  type CuratedIndicatorGroup,
} from './core/usecases/list-curated-indicators.js';
export { lookupIndicatorByCode } from './core/usecases/lookup-indicator-by-code.js';
export { fetchTimeSeries } from './core/usecases/fetch-time-series.js';
export { compareStates } from './core/usecases/compare-states.js';
export { getIndicatorMetadata } from './core/usecases/get-indicator-metadata.js';

// =============================================================================
// Types
// =============================================================================
export { CURATED_INDICATORS } from './core/catalog.js';
export {
  INDICATOR_CODE_PATTERN,
  DEFAULT_CATALOG_CANDIDATES,
  MAX_CATALOG_CANDIDATES,
  MAX_COMPARE_SCOPES,
} from './core/types.js';
export type {
  IndicatorRef,
  CuratedIndicator,
  CatalogEntry,
  IndicatorCandidate,
  IndicatorResolution,
  IndicatorMetadata,
  IndicatorLanguage,
  Periodicity,
  SeriesPoint,
  TimeSeries,
  ComparisonEntry,
  ComparisonRankRow,
  StateComparison,
} from './core/types.js';

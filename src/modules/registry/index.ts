/**
 * Registry Module - Public API
 */

// =============================================================================
// Adapter
// =============================================================================
export { makeDenueApi, DENUE_TOKEN_ENV, type DenueApiDeps } from './shell/repo/denue-api.js';
export type { RegistryApi, RegistrySearchDeps } from './core/ports.js';

// =============================================================================
// Use Cases
// =============================================================================
export { searchByTerm } from './core/usecases/search-by-term.js';
export { searchByRadius } from './core/usecases/search-by-radius.js';
export { searchByActivityAndArea } from './core/usecases/search-by-activity-and-area.js';
export {
  countBySector,
  inStratum,
  parseStratum,
  type CountBySectorDeps,
} from './core/usecases/count-by-sector.js';
export { getEstablishment, type GetEstablishmentDeps } from './core/usecases/get-establishment.js';

// =============================================================================
// Types
// =============================================================================
export {
  ALL_STRATA,
  ANY_TERM,
  DEFAULT_RADIUS_METERS,
  DEFAULT_SEARCH_LIMIT,
  MAX_COUNT_RECORDS,
  MAX_PAGE_SIZE,
  MAX_RADIUS_METERS,
  MAX_SEARCH_LIMIT,
  STRATA,
} from './core/types.js';
export type {
  Coordinates,
  Establishment,
  EstablishmentPage,
  QuantifyRequest,
  QuantifyResult,
  QuantifyRow,
  RadiusQuery,
  RegistryQuery,
  RegistryPage,
  PageWindow,
  SectorCount,
  StratumCode,
} from './core/types.js';

/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import { createConfig, parseEnv, type AppConfig } from '@/infra/config/env.js';

import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';
import type { RawSeries } from '@/modules/indicators/index.js';
import type { Establishment, QuantifyResult } from '@/modules/registry/index.js';
import type { DenueRecord } from '@/modules/registry/shell/repo/denue-mappers.js';

// ─────────────────────────────────────────────────────────────────────────────
// Health
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Config
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a test configuration from an environment map
 */
export const makeTestConfig = (env: NodeJS.ProcessEnv = {}): AppConfig =>
  createConfig(
    parseEnv({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      MCP_TRANSPORT: 'http',
      INEGI_INDICADORES_TOKEN: 'test-indicadores-token',
      INEGI_DENUE_TOKEN: 'test-denue-token',
      ...env,
    })
  );

// ─────────────────────────────────────────────────────────────────────────────
// Indicators
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create an upstream series with the given observations
 */
export const makeRawSeries = (
  observations: [string, number | null][] = [],
  overrides: Partial<RawSeries> = {}
): RawSeries => ({
  observations: observations.map(([period, value]) => ({ period, value })),
  unitCode: null,
  frequencyCode: null,
  unitMultiplier: null,
  topic: null,
  source: null,
  note: null,
  lastUpdate: null,
  ...overrides,
});

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export const makeEstablishment = (overrides: Partial<Establishment> = {}): Establishment => ({
  id: '1',
  name: 'Farmacia Centro',
  activityCode: '464111',
  activityDescription: 'Farmacias sin minisúper',
  sectorCode: '46',
  subsectorCode: '464',
  ramaCode: '4641',
  address: 'CALLE Juárez 10, Centro, C.P. 97000, Mérida, Mérida, Yucatán',
  coordinates: { lat: 20.97, lon: -89.62 },
  ageb: '0010',
  manzana: '012',
  phone: null,
  email: null,
  website: null,
  postalCode: '97000',
  stratum: '0 a 5 personas',
  ...overrides,
});

/**
 * Create `count` establishments with sequential ids starting at `firstId`
 */
export const makeEstablishments = (count: number, firstId = 1): Establishment[] =>
  Array.from({ length: count }, (_, index) =>
    makeEstablishment({ id: String(firstId + index), name: `Negocio ${String(firstId + index)}` })
  );

export const makeDenueRecord = (overrides: Partial<DenueRecord> = {}): DenueRecord => ({
  Id: '6748491',
  Nombre: 'FARMACIA CENTRO',
  Razon_social: '',
  Clase_actividad: 'Comercio al por menor de productos farmacéuticos',
  CLASE_ACTIVIDAD_ID: '464111',
  SECTOR_ACTIVIDAD_ID: '46',
  SUBSECTOR_ACTIVIDAD_ID: '464',
  RAMA_ACTIVIDAD_ID: '4641',
  Estrato: '0 a 5 personas',
  Tipo_vialidad: 'CALLE',
  Calle: '60',
  Num_Exterior: '501',
  Num_Interior: '',
  Colonia: 'CENTRO',
  CP: '97000',
  Ubicacion: 'MÉRIDA, Mérida, YUCATÁN',
  Telefono: '',
  Correo_e: '',
  Sitio_internet: '',
  Latitud: '20.9702',
  Longitud: '-89.6230',
  AGEB: '0010',
  Manzana: '012',
  ...overrides,
});

/**
 * Registry count with a single row for one activity and area
 */
export const makeQuantifyResult = (
  total: number,
  activityCode = '46',
  areaCode = '31'
): QuantifyResult => ({ total, rows: [{ activityCode, areaCode, total }] });

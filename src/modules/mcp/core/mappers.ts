/**
 * MCP Module - Output Mappers
 *
 * Domain values to the plain JSON shapes the tools return.
 */

import { toMcpError } from './errors.js';

import type {
  EstablishmentOutput,
  IndicatorOutput,
  PointOutput,
  ScopeOutput,
} from './types.js';
import type { QueryError } from '@/common/types/errors.js';
import type { GeoScope } from '@/common/types/geo.js';
import type { IndicatorRef, SeriesPoint } from '@/modules/indicators/index.js';
import type { Establishment } from '@/modules/registry/index.js';

export const toScopeOutput = (scope: GeoScope): ScopeOutput => ({
  level: scope.level,
  code: scope.code,
  name: scope.name,
});

export const toIndicatorOutput = (
  indicator: IndicatorRef & { category?: string }
): IndicatorOutput => {
  const output: IndicatorOutput = {
    code: indicator.code,
    name: indicator.name,
    unit: indicator.unit,
    periodicity: indicator.periodicity,
    coverageLevels: [...indicator.coverageLevels],
  };
  if (indicator.category !== undefined) {
    output.category = indicator.category;
  }
  return output;
};

export const toPointOutputs = (points: readonly SeriesPoint[]): PointOutput[] =>
  points.map((point) => ({ period: point.period, value: point.value }));

/** Most recent point that carries a value */
export const latestObservation = (
  points: readonly SeriesPoint[]
): { period: string; value: number } | null => {
  for (let index = points.length - 1; index >= 0; index -= 1) {
    const point = points[index];
    if (point?.value != null) {
      return { period: point.period, value: point.value };
    }
  }
  return null;
};

export const toEstablishmentOutput = (establishment: Establishment): EstablishmentOutput => ({
  id: establishment.id,
  name: establishment.name,
  activityCode: establishment.activityCode,
  activity: establishment.activityDescription,
  sectorCode: establishment.sectorCode,
  subsectorCode: establishment.subsectorCode,
  ramaCode: establishment.ramaCode,
  address: establishment.address,
  coordinates:
    establishment.coordinates === null
      ? null
      : { lat: establishment.coordinates.lat, lon: establishment.coordinates.lon },
  ageb: establishment.ageb,
  manzana: establishment.manzana,
  phone: establishment.phone,
  email: establishment.email,
  website: establishment.website,
  postalCode: establishment.postalCode,
  stratum: establishment.stratum,
});

/** Page failure after the first page, as reported next to the partial items */
export const toPartialFailure = (
  failure: QueryError | null
): { code: string; message: string } | null => {
  if (failure === null) {
    return null;
  }
  const { code, message } = toMcpError(failure);
  return { code, message };
};

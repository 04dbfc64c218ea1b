/**
 * Upstream code conventions for the indicator API.
 */

import { NATIONAL_CODE, type GeoScope } from '@/common/types/geo.js';

import { normalizeText } from './catalog.js';

import type { CuratedIndicator, IndicatorRef, Periodicity } from './types.js';

/**
 * Area segment of the series path: '00' national, 'SS000' state,
 * 'SSMMM' municipality.
 */
export const toSeriesArea = (scope: GeoScope): string => {
  switch (scope.level) {
    case 'national':
      return NATIONAL_CODE;
    case 'state':
      return `${scope.code}000`;
    case 'municipal':
      return scope.code;
  }
};

/**
 * Maps a frequency label from the CL_FREQ catalog ("Mensual", "Trimestral",
 * "Anual", "Quinquenal", ...) to a periodicity. Anything coarser than a
 * quarter counts as annual.
 */
export const periodicityFromFrequency = (label: string | null): Periodicity => {
  const normalized = normalizeText(label ?? '');
  if (normalized.includes('mens') || normalized.includes('month')) {
    return 'monthly';
  }
  if (normalized.includes('trimes') || normalized.includes('quarter')) {
    return 'quarterly';
  }
  return 'annual';
};

export const toIndicatorRef = (indicator: CuratedIndicator): IndicatorRef => ({
  code: indicator.code,
  name: indicator.name,
  unit: indicator.unit,
  periodicity: indicator.periodicity,
  coverageLevels: indicator.coverageLevels,
});

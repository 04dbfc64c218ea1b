/**
 * Live indicator lookup by code, bypassing the curated table.
 */

import { err, ok, type Result } from 'neverthrow';

import { createNotFoundError, type QueryError } from '@/common/types/errors.js';
import { ALL_GEO_LEVELS, NATIONAL_CODE } from '@/common/types/geo.js';

import { periodicityFromFrequency } from '../codes.js';

import type { IndicatorApi } from '../ports.js';
import type { CatalogEntry, IndicatorRef } from '../types.js';

export const UNKNOWN_UNIT = 'No especificada';

export interface LookupIndicatorDeps {
  indicatorApi: IndicatorApi;
}

const describeOrNull = async (
  code: string | null,
  describe: (code: string) => Promise<Result<string | null, QueryError>>
): Promise<Result<string | null, QueryError>> => (code === null ? ok(null) : describe(code));

/**
 * Completes a catalog row into an IndicatorRef. Unit and periodicity come
 * from the latest national observation's metadata, resolved through the
 * unit and frequency catalogs.
 */
export const describeCatalogEntry = async (
  deps: LookupIndicatorDeps,
  entry: CatalogEntry
): Promise<Result<IndicatorRef, QueryError>> => {
  const { indicatorApi } = deps;

  const seriesResult = await indicatorApi.fetchSeries({
    code: entry.code,
    area: NATIONAL_CODE,
    latestOnly: true,
  });
  if (seriesResult.isErr()) {
    return err(seriesResult.error);
  }
  const series = seriesResult.value;

  const [unitResult, frequencyResult] = await Promise.all([
    describeOrNull(series.unitCode, (code) => indicatorApi.describeUnit(code)),
    describeOrNull(series.frequencyCode, (code) => indicatorApi.describeFrequency(code)),
  ]);
  if (unitResult.isErr()) {
    return err(unitResult.error);
  }
  if (frequencyResult.isErr()) {
    return err(frequencyResult.error);
  }

  return ok({
    code: entry.code,
    name: entry.name,
    unit: unitResult.value ?? series.unitCode ?? UNKNOWN_UNIT,
    periodicity: periodicityFromFrequency(frequencyResult.value),
    // Coverage is not published per indicator; the upstream decides per request
    coverageLevels: ALL_GEO_LEVELS,
  });
};

export const lookupIndicatorByCode = async (
  deps: LookupIndicatorDeps,
  code: string
): Promise<Result<IndicatorRef, QueryError>> => {
  const entryResult = await deps.indicatorApi.lookupCatalogEntry(code);
  if (entryResult.isErr()) {
    return err(entryResult.error);
  }
  if (entryResult.value === null) {
    return err(createNotFoundError('indicator', code));
  }

  return describeCatalogEntry(deps, entryResult.value);
};

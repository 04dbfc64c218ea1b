/**
 * Indicator metadata (unit, frequency, topic, source, last update, notes)
 * as published alongside the latest national observation.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidParameterError,
  createNotFoundError,
  type QueryError,
} from '@/common/types/errors.js';
import { NATIONAL_CODE } from '@/common/types/geo.js';

import { findCuratedByCode } from '../catalog.js';
import { INDICATOR_CODE_PATTERN, type IndicatorMetadata } from '../types.js';

import type { IndicatorApi } from '../ports.js';

export interface GetIndicatorMetadataDeps {
  indicatorApi: IndicatorApi;
}

const resolveName = async (
  indicatorApi: IndicatorApi,
  code: string
): Promise<Result<string, QueryError>> => {
  const curated = findCuratedByCode(code);
  if (curated !== undefined) {
    return ok(curated.name);
  }

  const entryResult = await indicatorApi.lookupCatalogEntry(code);
  if (entryResult.isErr()) {
    return err(entryResult.error);
  }
  return entryResult.value === null
    ? err(createNotFoundError('indicator', code))
    : ok(entryResult.value.name);
};

export const getIndicatorMetadata = async (
  deps: GetIndicatorMetadataDeps,
  rawCode: string
): Promise<Result<IndicatorMetadata, QueryError>> => {
  const code = rawCode.trim();
  if (!INDICATOR_CODE_PATTERN.test(code)) {
    return err(
      createInvalidParameterError('indicador_id', `Indicator code '${rawCode}' must be numeric`)
    );
  }

  const { indicatorApi } = deps;

  const nameResult = await resolveName(indicatorApi, code);
  if (nameResult.isErr()) {
    return err(nameResult.error);
  }

  const seriesResult = await indicatorApi.fetchSeries({
    code,
    area: NATIONAL_CODE,
    latestOnly: true,
  });
  if (seriesResult.isErr()) {
    return err(seriesResult.error);
  }
  const series = seriesResult.value;

  let unit: string | null = series.unitCode;
  if (series.unitCode !== null) {
    const unitResult = await indicatorApi.describeUnit(series.unitCode);
    if (unitResult.isErr()) {
      return err(unitResult.error);
    }
    unit = unitResult.value ?? series.unitCode;
  }

  let frequency: string | null = series.frequencyCode;
  if (series.frequencyCode !== null) {
    const frequencyResult = await indicatorApi.describeFrequency(series.frequencyCode);
    if (frequencyResult.isErr()) {
      return err(frequencyResult.error);
    }
    frequency = frequencyResult.value ?? series.frequencyCode;
  }

  return ok({
    code,
    name: nameResult.value,
    unit,
    unitMultiplier: series.unitMultiplier,
    frequency,
    topic: series.topic,
    source: series.source,
    lastUpdate: series.lastUpdate,
    note: series.note,
  });
};

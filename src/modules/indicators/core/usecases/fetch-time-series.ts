/**
 * Time-Series Fetcher
 */

import { err, ok, type Result } from 'neverthrow';

import { createUnsupportedScopeError, type QueryError } from '@/common/types/errors.js';
import { validateScope } from '@/common/types/geo.js';

import { toSeriesArea } from '../codes.js';

import type { IndicatorApi, RawObservation } from '../ports.js';
import type { FetchTimeSeriesInput, SeriesPoint, TimeSeries } from '../types.js';

export interface FetchTimeSeriesDeps {
  indicatorApi: IndicatorApi;
}

/**
 * Ascending by period; for a repeated period the first upstream
 * observation is kept.
 */
export const normalizeObservations = (observations: readonly RawObservation[]): SeriesPoint[] => {
  const sorted = [...observations].sort((a, b) =>
    a.period < b.period ? -1 : a.period > b.period ? 1 : 0
  );

  const points: SeriesPoint[] = [];
  for (const observation of sorted) {
    if (points.at(-1)?.period !== observation.period) {
      points.push({ period: observation.period, value: observation.value });
    }
  }
  return points;
};

/**
 * Fetches one indicator for one scope. Scopes the indicator is not
 * published at fail before any request.
 */
export const fetchTimeSeries = async (
  deps: FetchTimeSeriesDeps,
  input: FetchTimeSeriesInput
): Promise<Result<TimeSeries, QueryError>> => {
  const { indicator, historical } = input;

  const scopeResult = validateScope(input.scope);
  if (scopeResult.isErr()) {
    return err(scopeResult.error);
  }
  const scope = scopeResult.value;

  if (!indicator.coverageLevels.includes(scope.level)) {
    return err(createUnsupportedScopeError(indicator.code, scope.level, indicator.coverageLevels));
  }

  const seriesResult = await deps.indicatorApi.fetchSeries({
    code: indicator.code,
    area: toSeriesArea(scope),
    latestOnly: !historical,
  });
  if (seriesResult.isErr()) {
    return err(seriesResult.error);
  }

  const series = seriesResult.value;
  return ok({
    indicator,
    scope,
    points: normalizeObservations(series.observations),
    lastUpdate: series.lastUpdate,
    source: series.source,
  });
};

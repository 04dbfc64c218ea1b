/**
 * State Comparison Engine
 *
 * Fetches one indicator across several scopes. A failing scope is reported
 * in its own entry and never discards the others.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type QueryError } from '@/common/types/errors.js';

import {
  COMPARE_CONCURRENCY,
  MAX_COMPARE_SCOPES,
  type CompareStatesInput,
  type ComparisonEntry,
  type ComparisonRankRow,
  type StateComparison,
  type TimeSeries,
} from '../types.js';
import { fetchTimeSeries } from './fetch-time-series.js';

import type { IndicatorApi } from '../ports.js';

export interface CompareStatesDeps {
  indicatorApi: IndicatorApi;
}

const latestValue = (series: TimeSeries): { period: string; value: number } | null => {
  for (let index = series.points.length - 1; index >= 0; index -= 1) {
    const point = series.points[index];
    if (point?.value != null) {
      return { period: point.period, value: point.value };
    }
  }
  return null;
};

/**
 * Highest latest value first. Equal values share a rank.
 */
export const rankEntries = (entries: readonly ComparisonEntry[]): ComparisonRankRow[] => {
  const rows = entries.flatMap((entry) => {
    if (entry.result.isErr()) {
      return [];
    }
    const latest = latestValue(entry.result.value);
    return latest === null ? [] : [{ scope: entry.scope, ...latest }];
  });

  rows.sort((a, b) => b.value - a.value);

  const ranked: ComparisonRankRow[] = [];
  rows.forEach((row, index) => {
    const previous = ranked[index - 1];
    const rank = previous !== undefined && previous.value === row.value ? previous.rank : index + 1;
    ranked.push({ rank, ...row });
  });
  return ranked;
};

export const compareStates = async (
  deps: CompareStatesDeps,
  input: CompareStatesInput
): Promise<Result<StateComparison, QueryError>> => {
  const { indicator, scopes } = input;
  const historical = input.historical ?? false;

  if (scopes.length === 0) {
    return err(createInvalidParameterError('estados', 'At least one state code is required'));
  }
  if (scopes.length > MAX_COMPARE_SCOPES) {
    return err(
      createInvalidParameterError(
        'estados',
        `At most ${String(MAX_COMPARE_SCOPES)} scopes can be compared at once`
      )
    );
  }

  const entries: ComparisonEntry[] = [];
  for (let index = 0; index < scopes.length; index += COMPARE_CONCURRENCY) {
    const batch = scopes.slice(index, index + COMPARE_CONCURRENCY);
    const results = await Promise.all(
      batch.map((scope) => fetchTimeSeries(deps, { indicator, scope, historical }))
    );
    batch.forEach((scope, batchIndex) => {
      const result = results[batchIndex];
      if (result !== undefined) {
        entries.push({ scope, result });
      }
    });
  }

  return ok({ indicator, entries, ranking: rankEntries(entries) });
};

/**
 * MCP Use Case: obtener_serie_temporal
 *
 * Resolves the indicator (code or text), then fetches its series for one
 * area. National by default.
 */

import { err, ok, type Result } from 'neverthrow';

import { NATIONAL_SCOPE, parseAreaCode, type GeoScope } from '@/common/types/geo.js';
import { fetchTimeSeries, resolveIndicator } from '@/modules/indicators/index.js';

import { toMcpError, type McpError } from '../errors.js';
import {
  latestObservation,
  toIndicatorOutput,
  toPointOutputs,
  toScopeOutput,
} from '../mappers.js';

import type { McpToolDeps } from '../ports.js';
import type { GetTimeSeriesInput, TimeSeriesOutput } from '../types.js';
import type { InvalidParameterError } from '@/common/types/errors.js';

export type GetTimeSeriesDeps = Pick<McpToolDeps, 'indicatorApi'>;

export async function getTimeSeries(
  deps: GetTimeSeriesDeps,
  input: GetTimeSeriesInput
): Promise<Result<TimeSeriesOutput, McpError>> {
  // Scope first: a malformed area never costs an upstream call
  const scopeResult: Result<GeoScope, InvalidParameterError> =
    input.codigo_geo === undefined
      ? ok(NATIONAL_SCOPE)
      : parseAreaCode(input.codigo_geo, 'codigo_geo');
  if (scopeResult.isErr()) {
    return err(toMcpError(scopeResult.error));
  }

  const resolution = await resolveIndicator(deps, input.indicador_id);
  if (resolution.isErr()) {
    return err(toMcpError(resolution.error));
  }
  const { indicator, source, candidates } = resolution.value;

  const seriesResult = await fetchTimeSeries(deps, {
    indicator,
    scope: scopeResult.value,
    historical: input.historica,
  });
  if (seriesResult.isErr()) {
    return err(toMcpError(seriesResult.error));
  }
  const series = seriesResult.value;

  return ok({
    indicator: toIndicatorOutput(indicator),
    resolvedFrom: source,
    candidates: candidates.map((candidate) => ({ ...candidate })),
    scope: toScopeOutput(series.scope),
    lastUpdate: series.lastUpdate,
    source: series.source,
    observationCount: series.points.length,
    latest: latestObservation(series.points),
    points: toPointOutputs(series.points),
  });
}

/**
 * MCP Use Case: comparar_estados
 *
 * One indicator across several states, with per-state failures kept next
 * to the successful entries.
 */

import { err, ok, type Result } from 'neverthrow';

import { stateScope, type GeoScope } from '@/common/types/geo.js';
import { compareStates, resolveIndicator } from '@/modules/indicators/index.js';

import { toMcpError, type McpError } from '../errors.js';
import {
  latestObservation,
  toIndicatorOutput,
  toPointOutputs,
  toScopeOutput,
} from '../mappers.js';

import type { McpToolDeps } from '../ports.js';
import type {
  CompareStatesOutput,
  CompareStatesToolInput,
  ComparisonEntryOutput,
} from '../types.js';

export type CompareStateIndicatorDeps = Pick<McpToolDeps, 'indicatorApi'>;

export async function compareStateIndicator(
  deps: CompareStateIndicatorDeps,
  input: CompareStatesToolInput
): Promise<Result<CompareStatesOutput, McpError>> {
  // Every state code is checked before the indicator is resolved
  const scopes: GeoScope[] = [];
  for (const rawCode of input.estados) {
    const scopeResult = stateScope(rawCode, 'estados');
    if (scopeResult.isErr()) {
      return err(toMcpError(scopeResult.error));
    }
    scopes.push(scopeResult.value);
  }

  const resolution = await resolveIndicator(deps, input.indicador_id);
  if (resolution.isErr()) {
    return err(toMcpError(resolution.error));
  }
  const { indicator } = resolution.value;

  const comparisonResult = await compareStates(deps, {
    indicator,
    scopes,
    historical: input.historica ?? false,
  });
  if (comparisonResult.isErr()) {
    return err(toMcpError(comparisonResult.error));
  }
  const comparison = comparisonResult.value;

  const entries = comparison.entries.map((entry): ComparisonEntryOutput => {
    const state = toScopeOutput(entry.scope);
    if (entry.result.isErr()) {
      const { code, message } = toMcpError(entry.result.error);
      return { state, ok: false, error: { code, message } };
    }
    const { points } = entry.result.value;
    return {
      state,
      ok: true,
      latest: latestObservation(points),
      points: toPointOutputs(points),
    };
  });

  return ok({
    indicator: toIndicatorOutput(indicator),
    entries,
    ranking: comparison.ranking.map((row) => ({
      rank: row.rank,
      state: toScopeOutput(row.scope),
      period: row.period,
      value: row.value,
    })),
    failed: entries.filter((entry) => !entry.ok).length,
  });
}

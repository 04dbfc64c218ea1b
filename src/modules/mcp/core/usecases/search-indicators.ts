/**
 * MCP Use Case: buscar_indicadores
 *
 * Keyword search over the curated indicator table. No upstream call.
 */

import { err, ok, type Result } from 'neverthrow';

import { CURATED_INDICATORS, searchCuratedIndicators } from '@/modules/indicators/index.js';

import { toMcpError, type McpError } from '../errors.js';
import { toIndicatorOutput } from '../mappers.js';

import type { SearchIndicatorsInput, SearchIndicatorsOutput } from '../types.js';

export function searchIndicators(
  input: SearchIndicatorsInput
): Result<SearchIndicatorsOutput, McpError> {
  const result = searchCuratedIndicators(input.keyword);
  if (result.isErr()) {
    return err(toMcpError(result.error));
  }

  const indicators = result.value.map(toIndicatorOutput);
  return ok({
    keyword: input.keyword.trim(),
    total: indicators.length,
    indicators,
    // Nothing matched: show what can be asked for instead
    suggestions:
      indicators.length === 0
        ? CURATED_INDICATORS.map((indicator) => ({ code: indicator.code, name: indicator.name }))
        : [],
  });
}

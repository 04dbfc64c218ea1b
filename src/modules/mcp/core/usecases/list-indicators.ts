/**
 * MCP Use Case: listar_indicadores_disponibles
 */

import { listCuratedIndicators } from '@/modules/indicators/index.js';

import { toIndicatorOutput } from '../mappers.js';

import type { ListIndicatorsOutput } from '../types.js';

/** Curated indicators grouped by category, in table order */
export function listIndicators(): ListIndicatorsOutput {
  const categories = listCuratedIndicators().map((group) => ({
    category: group.category,
    indicators: group.indicators.map(toIndicatorOutput),
  }));

  return {
    total: categories.reduce((sum, group) => sum + group.indicators.length, 0),
    categories,
  };
}

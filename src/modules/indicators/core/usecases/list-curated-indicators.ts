/**
 * Lists the curated indicator table grouped by category.
 */

import { CURATED_INDICATORS } from '../catalog.js';

import type { CuratedIndicator } from '../types.js';

export interface CuratedIndicatorGroup {
  readonly category: string;
  readonly indicators: readonly CuratedIndicator[];
}

/** Groups keep the table's order, as do indicators within a group */
export const listCuratedIndicators = (): CuratedIndicatorGroup[] => {
  const groups = new Map<string, CuratedIndicator[]>();

  for (const indicator of CURATED_INDICATORS) {
    const group = groups.get(indicator.category);
    if (group === undefined) {
      groups.set(indicator.category, [indicator]);
    } else {
      group.push(indicator);
    }
  }

  return [...groups.entries()].map(([category, indicators]) => ({ category, indicators }));
};

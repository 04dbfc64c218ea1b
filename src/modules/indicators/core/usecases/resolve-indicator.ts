/**
 * Indicator Catalog Resolver
 *
 * Codes go to the curated table, then to a live catalog lookup. Free text
 * goes to the curated names, then to the ranked full catalog.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidParameterError,
  createNotFoundError,
  type QueryError,
} from '@/common/types/errors.js';

import { findCuratedByCode } from '../catalog.js';
import { toIndicatorRef } from '../codes.js';
import {
  DEFAULT_CATALOG_CANDIDATES,
  INDICATOR_CODE_PATTERN,
  type IndicatorResolution,
} from '../types.js';
import { describeCatalogEntry, lookupIndicatorByCode } from './lookup-indicator-by-code.js';
import { searchCuratedIndicators } from './search-curated-indicators.js';
import { searchFullCatalog } from './search-full-catalog.js';

import type { IndicatorApi } from '../ports.js';

export interface ResolveIndicatorDeps {
  indicatorApi: IndicatorApi;
}

const resolveCode = async (
  deps: ResolveIndicatorDeps,
  code: string
): Promise<Result<IndicatorResolution, QueryError>> => {
  const curated = findCuratedByCode(code);
  if (curated !== undefined) {
    return ok({
      indicator: toIndicatorRef(curated),
      source: 'curated',
      candidates: [{ code: curated.code, name: curated.name, score: null }],
    });
  }

  const live = await lookupIndicatorByCode(deps, code);
  if (live.isErr()) {
    return err(live.error);
  }
  return ok({
    indicator: live.value,
    source: 'catalog',
    candidates: [{ code: live.value.code, name: live.value.name, score: null }],
  });
};

const resolveText = async (
  deps: ResolveIndicatorDeps,
  text: string
): Promise<Result<IndicatorResolution, QueryError>> => {
  const curatedResult = searchCuratedIndicators(text);
  if (curatedResult.isErr()) {
    return err(curatedResult.error);
  }

  // Any curated match wins over the live catalog
  const [first, ...rest] = curatedResult.value;
  if (first !== undefined) {
    return ok({
      indicator: toIndicatorRef(first),
      source: 'curated',
      candidates: [first, ...rest].map((indicator) => ({
        code: indicator.code,
        name: indicator.name,
        score: null,
      })),
    });
  }

  const rankedResult = await searchFullCatalog(deps, {
    keyword: text,
    limit: DEFAULT_CATALOG_CANDIDATES,
  });
  if (rankedResult.isErr()) {
    return err(rankedResult.error);
  }

  const candidates = rankedResult.value;
  const top = candidates[0];
  if (top === undefined) {
    return err(createNotFoundError('indicator', text));
  }

  const described = await describeCatalogEntry(deps, { code: top.code, name: top.name });
  if (described.isErr()) {
    return err(described.error);
  }

  return ok({ indicator: described.value, source: 'catalog', candidates });
};

/**
 * Resolves a code or free-text reference to a single indicator. The ranked
 * candidates stay attached so ambiguous text queries are visible.
 */
export const resolveIndicator = async (
  deps: ResolveIndicatorDeps,
  query: string
): Promise<Result<IndicatorResolution, QueryError>> => {
  const trimmed = query.trim();
  if (trimmed === '') {
    return err(createInvalidParameterError('indicador_id', 'An indicator code or name is required'));
  }

  return INDICATOR_CODE_PATTERN.test(trimmed)
    ? resolveCode(deps, trimmed)
    : resolveText(deps, trimmed);
};

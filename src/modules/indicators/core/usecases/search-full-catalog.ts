/**
 * Fuzzy search over the full upstream indicator catalog.
 */

import Fuse, { type IFuseOptions } from 'fuse.js';
import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type QueryError } from '@/common/types/errors.js';

import { normalizeText } from '../catalog.js';
import {
  DEFAULT_CATALOG_CANDIDATES,
  MAX_CATALOG_CANDIDATES,
  type CatalogEntry,
  type IndicatorCandidate,
} from '../types.js';

import type { IndicatorApi } from '../ports.js';

export interface SearchFullCatalogDeps {
  indicatorApi: IndicatorApi;
}

export interface SearchFullCatalogInput {
  keyword: string;
  limit?: number;
}

interface SearchableEntry {
  entry: CatalogEntry;
  searchName: string;
}

/**
 * Threshold of 0.3 keeps near-misses ("poblacin") while rejecting
 * unrelated names. Names are pre-normalized, so accents never count.
 */
const FUSE_OPTIONS: IFuseOptions<SearchableEntry> = {
  keys: [{ name: 'searchName', weight: 1.0 }],
  threshold: 0.3,
  ignoreLocation: true,
  includeScore: true,
};

/**
 * Ranks the catalog against a keyword, best first. An exact code match
 * ranks first with score 0. Zero matches is an empty list.
 */
export const searchFullCatalog = async (
  deps: SearchFullCatalogDeps,
  input: SearchFullCatalogInput
): Promise<Result<IndicatorCandidate[], QueryError>> => {
  const keyword = normalizeText(input.keyword);
  if (keyword === '') {
    return err(createInvalidParameterError('keyword', 'A search keyword is required'));
  }

  const limit = input.limit ?? DEFAULT_CATALOG_CANDIDATES;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_CATALOG_CANDIDATES) {
    return err(
      createInvalidParameterError(
        'limite',
        `limit must be an integer from 1 to ${String(MAX_CATALOG_CANDIDATES)}`
      )
    );
  }

  const catalogResult = await deps.indicatorApi.listCatalog();
  if (catalogResult.isErr()) {
    return err(catalogResult.error);
  }

  const catalog = catalogResult.value;
  const exact = catalog.find((entry) => entry.code === keyword);

  const fuse = new Fuse(
    catalog.map((entry) => ({ entry, searchName: normalizeText(entry.name) })),
    FUSE_OPTIONS
  );
  const ranked: IndicatorCandidate[] = fuse
    .search(keyword)
    .filter((result) => result.item.entry.code !== exact?.code)
    .map((result) => ({
      code: result.item.entry.code,
      name: result.item.entry.name,
      score: result.score ?? null,
    }));

  const candidates =
    exact !== undefined ? [{ code: exact.code, name: exact.name, score: 0 }, ...ranked] : ranked;

  return ok(candidates.slice(0, limit));
};

/**
 * Shared pagination for registry searches.
 *
 * Requests record windows until the limit is reached, the upstream runs
 * dry (an empty or short page) or the reported total is covered. Never
 * issues more than ceil(limit / pageSize) requests.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type QueryError } from '@/common/types/errors.js';

import {
  MAX_PAGE_SIZE,
  MAX_SEARCH_LIMIT,
  type Establishment,
  type EstablishmentPage,
  type PageWindow,
  type RegistryPage,
} from './types.js';

export type PageFetcher = (window: PageWindow) => Promise<Result<RegistryPage, QueryError>>;

export interface CollectPagesOptions {
  limit: number;
  /** Clamped to [1, MAX_PAGE_SIZE] */
  pageSize: number;
}

export const validateLimit = (
  limit: number,
  field = 'limite'
): Result<number, QueryError> =>
  Number.isInteger(limit) && limit >= 1 && limit <= MAX_SEARCH_LIMIT
    ? ok(limit)
    : err(
        createInvalidParameterError(
          field,
          `limit must be an integer from 1 to ${String(MAX_SEARCH_LIMIT)}, got ${String(limit)}`
        )
      );

export const effectivePageSize = (configured: number): number =>
  Math.max(1, Math.min(Math.floor(configured), MAX_PAGE_SIZE));

/**
 * Pages through a query. A failure on the first page is returned as is; a
 * later failure keeps the records gathered so far and is reported in
 * `failure`.
 */
export const collectPages = async (
  fetchPage: PageFetcher,
  options: CollectPagesOptions
): Promise<Result<EstablishmentPage, QueryError>> => {
  const { limit } = options;
  const pageSize = effectivePageSize(options.pageSize);
  const maxPages = Math.ceil(limit / pageSize);

  const items: Establishment[] = [];
  let totalAvailable: number | null = null;
  let pagesFetched = 0;
  let exhausted = false;
  let failure: QueryError | null = null;

  while (pagesFetched < maxPages && items.length < limit) {
    const count = Math.min(pageSize, limit - items.length);
    const result = await fetchPage({ offset: items.length, count });
    pagesFetched += 1;

    if (result.isErr()) {
      if (pagesFetched === 1) {
        return err(result.error);
      }
      failure = result.error;
      break;
    }

    const page = result.value;
    if (page.totalAvailable !== null) {
      totalAvailable = page.totalAvailable;
    }
    items.push(...page.items);

    if (page.items.length < count) {
      exhausted = true;
      break;
    }
    if (totalAvailable !== null && items.length >= totalAvailable) {
      exhausted = true;
      break;
    }
  }

  const kept = items.slice(0, limit);
  const hasMore =
    failure !== null ||
    items.length > limit ||
    (!exhausted && (totalAvailable === null || totalAvailable > kept.length));

  return ok({ items: kept, totalAvailable, hasMore, pagesFetched, failure });
};

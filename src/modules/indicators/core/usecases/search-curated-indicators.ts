/**
 * Keyword search over the curated indicator table. No network.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type InvalidParameterError } from '@/common/types/errors.js';

import { CURATED_INDICATORS, normalizeText } from '../catalog.js';

import type { CuratedIndicator } from '../types.js';

/**
 * Case- and accent-insensitive substring match on names and categories.
 * Zero matches is an empty list.
 */
export const searchCuratedIndicators = (
  keyword: string
): Result<CuratedIndicator[], InvalidParameterError> => {
  const needle = normalizeText(keyword);
  if (needle === '') {
    return err(createInvalidParameterError('keyword', 'A search keyword is required'));
  }

  return ok(
    CURATED_INDICATORS.filter(
      (indicator) =>
        normalizeText(indicator.name).includes(needle) ||
        normalizeText(indicator.category) === needle
    )
  );
};

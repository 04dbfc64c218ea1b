/**
 * Establishment search by economic activity within a geographic area.
 */

import { err, ok, type Result } from 'neverthrow';

import { NATIONAL_CODE, municipalityCodeOf, stateCodeOf, type GeoScope } from '@/common/types/geo.js';

import { parseActivityCode } from '../activity.js';
import { collectPages, validateLimit } from '../pagination.js';

import type { RegistrySearchDeps } from '../ports.js';
import type {
  ActivityAreaQuery,
  EstablishmentPage,
  SearchByActivityAndAreaInput,
} from '../types.js';
import type { QueryError } from '@/common/types/errors.js';

/** Placeholder the registry reads as "any" in path slots */
const ANY_SLOT = '0';

export const buildActivityAreaQuery = (
  activityCode: string,
  scope: GeoScope,
  name?: string
): Result<ActivityAreaQuery, QueryError> => {
  const activityResult = parseActivityCode(activityCode);
  if (activityResult.isErr()) {
    return err(activityResult.error);
  }

  const trimmedName = name?.trim() ?? '';
  return ok({
    kind: 'activity-area',
    stateCode: stateCodeOf(scope) ?? NATIONAL_CODE,
    municipalityCode: municipalityCodeOf(scope) ?? ANY_SLOT,
    activity: activityResult.value,
    name: trimmedName === '' ? ANY_SLOT : trimmedName,
  });
};

export const searchByActivityAndArea = async (
  deps: RegistrySearchDeps,
  input: SearchByActivityAndAreaInput
): Promise<Result<EstablishmentPage, QueryError>> => {
  const queryResult = buildActivityAreaQuery(input.activityCode, input.scope, input.name);
  if (queryResult.isErr()) {
    return err(queryResult.error);
  }

  const limitResult = validateLimit(input.limit);
  if (limitResult.isErr()) {
    return err(limitResult.error);
  }

  const query = queryResult.value;
  return collectPages((window) => deps.registryApi.fetchPage(query, window), {
    limit: limitResult.value,
    pageSize: deps.pageSize,
  });
};

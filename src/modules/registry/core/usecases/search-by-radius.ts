/**
 * Establishment search around a point.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type QueryError } from '@/common/types/errors.js';

import { validateLimit } from '../pagination.js';
import {
  ANY_TERM,
  MAX_RADIUS_METERS,
  type EstablishmentPage,
  type RadiusQuery,
  type SearchByRadiusInput,
} from '../types.js';

import type { RegistrySearchDeps } from '../ports.js';

/**
 * Coordinates and radius are checked before any request: latitude within
 * [-90, 90], longitude within [-180, 180], radius within (0, 5000] meters.
 */
export const searchByRadius = async (
  deps: Pick<RegistrySearchDeps, 'registryApi'>,
  input: SearchByRadiusInput
): Promise<Result<EstablishmentPage, QueryError>> => {
  const { lat, lon, radiusMeters } = input;

  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    return err(
      createInvalidParameterError('latitud', `Latitude ${String(lat)} must be within [-90, 90]`)
    );
  }
  if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
    return err(
      createInvalidParameterError('longitud', `Longitude ${String(lon)} must be within [-180, 180]`)
    );
  }
  if (!Number.isFinite(radiusMeters) || radiusMeters <= 0 || radiusMeters > MAX_RADIUS_METERS) {
    return err(
      createInvalidParameterError(
        'radio',
        `Radius ${String(radiusMeters)} must be greater than 0 and at most ${String(MAX_RADIUS_METERS)} meters`
      )
    );
  }

  const limitResult = validateLimit(input.limit);
  if (limitResult.isErr()) {
    return err(limitResult.error);
  }

  const term = input.term?.trim() ?? '';
  const query: RadiusQuery = {
    kind: 'radius',
    term: term === '' ? ANY_TERM : term,
    lat,
    lon,
    radiusMeters,
  };

  // One request per search: the registry answers with the whole radius
  const radiusResult = await deps.registryApi.fetchRadius(query);
  if (radiusResult.isErr()) {
    return err(radiusResult.error);
  }
  const all = radiusResult.value;
  const limit = limitResult.value;

  return ok({
    items: all.slice(0, limit),
    totalAvailable: all.length,
    hasMore: all.length > limit,
    pagesFetched: 1,
    failure: null,
  });
};

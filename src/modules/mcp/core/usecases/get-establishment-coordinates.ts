/**
 * MCP Use Case: obtener_coordenadas_establecimientos
 *
 * Same search as buscar_establecimientos, reduced to what a map needs.
 */

import { err, ok, type Result } from 'neverthrow';

import { searchByRadius, searchByTerm } from '@/modules/registry/index.js';

import { toMcpError, type McpError } from '../errors.js';
import { toPartialFailure } from '../mappers.js';
import { pickSearchMode } from '../search-mode.js';

import type { McpToolDeps } from '../ports.js';
import type { CoordinatesOutput, GetCoordinatesInput } from '../types.js';
import type { QueryError } from '@/common/types/errors.js';
import type { EstablishmentPage } from '@/modules/registry/index.js';

export type GetEstablishmentCoordinatesDeps = Pick<McpToolDeps, 'registryApi' | 'pageSize'>;

const toCoordinatesOutput = (
  mode: CoordinatesOutput['mode'],
  page: EstablishmentPage
): CoordinatesOutput => {
  const establishments = page.items.map((item) => ({
    id: item.id,
    name: item.name,
    address: item.address,
    coordinates:
      item.coordinates === null ? null : { lat: item.coordinates.lat, lon: item.coordinates.lon },
  }));

  return {
    mode,
    returned: establishments.length,
    withoutCoordinates: establishments.filter((item) => item.coordinates === null).length,
    hasMore: page.hasMore,
    partialFailure: toPartialFailure(page.failure),
    establishments,
  };
};

export async function getEstablishmentCoordinates(
  deps: GetEstablishmentCoordinatesDeps,
  input: GetCoordinatesInput
): Promise<Result<CoordinatesOutput, McpError>> {
  const modeResult = pickSearchMode(input);
  if (modeResult.isErr()) {
    return err(modeResult.error);
  }
  const mode = modeResult.value;

  const pageResult: Result<EstablishmentPage, QueryError> =
    mode.kind === 'radius'
      ? await searchByRadius(deps, {
          lat: mode.lat,
          lon: mode.lon,
          radiusMeters: mode.radiusMeters,
          limit: input.limite,
          term: input.termino,
        })
      : await searchByTerm(deps, { term: input.termino, limit: input.limite });

  return pageResult.isErr()
    ? err(toMcpError(pageResult.error))
    : ok(toCoordinatesOutput(mode.kind, pageResult.value));
}

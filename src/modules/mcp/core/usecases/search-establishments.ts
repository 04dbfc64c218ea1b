/**
 * MCP Use Case: buscar_establecimientos
 *
 * Term search across the country or one state, or a radius search when
 * coordinates are given.
 */

import { err, ok, type Result } from 'neverthrow';

import { stateScope, type GeoScope } from '@/common/types/geo.js';
import { searchByRadius, searchByTerm } from '@/modules/registry/index.js';

import { invalidInputError, toMcpError, type McpError } from '../errors.js';
import { toEstablishmentOutput, toPartialFailure } from '../mappers.js';
import { pickSearchMode } from '../search-mode.js';

import type { McpToolDeps } from '../ports.js';
import type { EstablishmentsOutput, SearchEstablishmentsInput } from '../types.js';
import type { EstablishmentPage } from '@/modules/registry/index.js';

export type SearchEstablishmentsDeps = Pick<McpToolDeps, 'registryApi' | 'pageSize'>;

/** '', '0' and '00' all mean the whole country */
const isNationwide = (entidad: string | undefined): boolean =>
  entidad === undefined || /^0{0,2}$/.test(entidad.trim());

export const toEstablishmentsOutput = (
  mode: EstablishmentsOutput['mode'],
  page: EstablishmentPage
): EstablishmentsOutput => ({
  mode,
  returned: page.items.length,
  totalAvailable: page.totalAvailable,
  hasMore: page.hasMore,
  partialFailure: toPartialFailure(page.failure),
  establishments: page.items.map(toEstablishmentOutput),
});

export async function searchEstablishments(
  deps: SearchEstablishmentsDeps,
  input: SearchEstablishmentsInput
): Promise<Result<EstablishmentsOutput, McpError>> {
  const modeResult = pickSearchMode(input);
  if (modeResult.isErr()) {
    return err(modeResult.error);
  }
  const mode = modeResult.value;

  if (mode.kind === 'radius') {
    if (!isNationwide(input.entidad)) {
      return err(invalidInputError('entidad: cannot be combined with latitud and longitud'));
    }
    const pageResult = await searchByRadius(deps, {
      lat: mode.lat,
      lon: mode.lon,
      radiusMeters: mode.radiusMeters,
      limit: input.limite,
      term: input.termino,
    });
    return pageResult.isErr()
      ? err(toMcpError(pageResult.error))
      : ok(toEstablishmentsOutput('radius', pageResult.value));
  }

  let scope: GeoScope | undefined;
  if (input.entidad !== undefined && !isNationwide(input.entidad)) {
    const scopeResult = stateScope(input.entidad);
    if (scopeResult.isErr()) {
      return err(toMcpError(scopeResult.error));
    }
    scope = scopeResult.value;
  }

  const pageResult = await searchByTerm(deps, {
    term: input.termino,
    limit: input.limite,
    scope,
  });
  return pageResult.isErr()
    ? err(toMcpError(pageResult.error))
    : ok(toEstablishmentsOutput('term', pageResult.value));
}

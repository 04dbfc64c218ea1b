/**
 * MCP Use Case: buscar_area_act
 *
 * Establishments by state, municipality, activity class and name. Every
 * slot accepts '0' for "any".
 */

import { err, ok, type Result } from 'neverthrow';

import { NATIONAL_SCOPE, municipalScope, stateScope, type GeoScope } from '@/common/types/geo.js';
import { searchByActivityAndArea } from '@/modules/registry/index.js';

import { invalidInputError, toMcpError, type McpError } from '../errors.js';
import { toEstablishmentsOutput } from './search-establishments.js';

import type { McpToolDeps } from '../ports.js';
import type { EstablishmentsOutput, SearchActivityAreaInput } from '../types.js';

export type SearchActivityAreaDeps = Pick<McpToolDeps, 'registryApi' | 'pageSize'>;

const isAny = (value: string): boolean => /^0{0,3}$/.test(value.trim());

/** entidad + municipio to a scope; a municipality needs its state */
export const toAreaScope = (entidad: string, municipio: string): Result<GeoScope, McpError> => {
  const anyState = isAny(entidad);
  const anyMunicipality = isAny(municipio);

  if (anyState) {
    return anyMunicipality
      ? ok(NATIONAL_SCOPE)
      : err(invalidInputError('municipio: a municipality requires its entidad'));
  }

  const scopeResult = anyMunicipality ? stateScope(entidad) : municipalScope(entidad, municipio);
  return scopeResult.mapErr(toMcpError);
};

export async function searchActivityArea(
  deps: SearchActivityAreaDeps,
  input: SearchActivityAreaInput
): Promise<Result<EstablishmentsOutput, McpError>> {
  const scopeResult = toAreaScope(input.entidad, input.municipio);
  if (scopeResult.isErr()) {
    return err(scopeResult.error);
  }

  const pageResult = await searchByActivityAndArea(deps, {
    activityCode: input.clase ?? '0',
    scope: scopeResult.value,
    limit: input.limite,
    name: input.nombre,
  });
  return pageResult.isErr()
    ? err(toMcpError(pageResult.error))
    : ok(toEstablishmentsOutput('activity-area', pageResult.value));
}

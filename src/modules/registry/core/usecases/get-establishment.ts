/**
 * Single-establishment lookup by registry id.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidParameterError,
  createNotFoundError,
  type QueryError,
} from '@/common/types/errors.js';

import { ESTABLISHMENT_ID_PATTERN, type Establishment } from '../types.js';

import type { RegistryApi } from '../ports.js';

export interface GetEstablishmentDeps {
  registryApi: RegistryApi;
}

export const getEstablishment = async (
  deps: GetEstablishmentDeps,
  rawId: string
): Promise<Result<Establishment, QueryError>> => {
  const id = rawId.trim();
  if (!ESTABLISHMENT_ID_PATTERN.test(id)) {
    return err(
      createInvalidParameterError(
        'id_establecimiento',
        `Establishment id '${rawId}' must be numeric`
      )
    );
  }

  const result = await deps.registryApi.fetchEstablishment(id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createNotFoundError('establishment', id, `No establishment with id '${id}'`));
  }
  return ok(result.value);
};

/**
 * Establishment search by free-text term, optionally within one state.
 */

import { err, type Result } from 'neverthrow';

import { createInvalidParameterError, type QueryError } from '@/common/types/errors.js';
import { NATIONAL_CODE } from '@/common/types/geo.js';

import { collectPages, validateLimit } from '../pagination.js';

import type { RegistrySearchDeps } from '../ports.js';
import type { EstablishmentPage, SearchByTermInput, TermQuery } from '../types.js';

export const searchByTerm = async (
  deps: RegistrySearchDeps,
  input: SearchByTermInput
): Promise<Result<EstablishmentPage, QueryError>> => {
  const term = input.term.trim();
  if (term === '') {
    return err(createInvalidParameterError('termino', 'A search term is required'));
  }

  const limitResult = validateLimit(input.limit);
  if (limitResult.isErr()) {
    return err(limitResult.error);
  }

  const { scope } = input;
  if (scope?.level === 'municipal') {
    return err(
      createInvalidParameterError(
        'entidad',
        'Term search narrows by state only; use the activity and area search for municipalities'
      )
    );
  }

  const query: TermQuery = {
    kind: 'term',
    term,
    stateCode: scope?.level === 'state' ? scope.code : NATIONAL_CODE,
  };

  return collectPages((window) => deps.registryApi.fetchPage(query, window), {
    limit: limitResult.value,
    pageSize: deps.pageSize,
  });
};

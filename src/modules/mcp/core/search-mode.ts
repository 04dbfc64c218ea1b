/**
 * MCP Module - Establishment search mode
 *
 * `latitud` and `longitud` together switch a term search to a radius search.
 */

import { err, ok, type Result } from 'neverthrow';

import { DEFAULT_RADIUS_METERS } from '@/modules/registry/index.js';

import { invalidInputError, type McpError } from './errors.js';

export type SearchMode =
  | { kind: 'term' }
  | { kind: 'radius'; lat: number; lon: number; radiusMeters: number };

export interface LocationArgs {
  latitud?: number | undefined;
  longitud?: number | undefined;
  radio?: number | undefined;
}

export const pickSearchMode = (args: LocationArgs): Result<SearchMode, McpError> => {
  const { latitud, longitud, radio } = args;

  if (latitud === undefined && longitud === undefined) {
    return radio === undefined
      ? ok({ kind: 'term' })
      : err(invalidInputError('radio: requires latitud and longitud'));
  }
  if (latitud === undefined || longitud === undefined) {
    return err(invalidInputError('latitud, longitud: both coordinates are required together'));
  }

  return ok({
    kind: 'radius',
    lat: latitud,
    lon: longitud,
    radiusMeters: radio ?? DEFAULT_RADIUS_METERS,
  });
};

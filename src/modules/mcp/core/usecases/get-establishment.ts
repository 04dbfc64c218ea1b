/**
 * MCP Use Case: obtener_establecimiento
 */

import { err, ok, type Result } from 'neverthrow';

import { getEstablishment as fetchEstablishmentById } from '@/modules/registry/index.js';

import { toMcpError, type McpError } from '../errors.js';
import { toEstablishmentOutput } from '../mappers.js';

import type { McpToolDeps } from '../ports.js';
import type { EstablishmentDetailOutput, GetEstablishmentInput } from '../types.js';

export type GetEstablishmentDeps = Pick<McpToolDeps, 'registryApi'>;

export async function getEstablishment(
  deps: GetEstablishmentDeps,
  input: GetEstablishmentInput
): Promise<Result<EstablishmentDetailOutput, McpError>> {
  const result = await fetchEstablishmentById(deps, input.id_establecimiento);
  if (result.isErr()) {
    return err(toMcpError(result.error));
  }
  return ok({ establishment: toEstablishmentOutput(result.value) });
}

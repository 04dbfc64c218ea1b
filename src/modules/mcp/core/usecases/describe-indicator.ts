/**
 * MCP Use Case: obtener_metadatos_indicador
 */

import { err, ok, type Result } from 'neverthrow';

import { getIndicatorMetadata } from '@/modules/indicators/index.js';

import { toMcpError, type McpError } from '../errors.js';

import type { McpToolDeps } from '../ports.js';
import type { GetIndicatorMetadataInput, IndicatorMetadataOutput } from '../types.js';

export type DescribeIndicatorDeps = Pick<McpToolDeps, 'indicatorApi'>;

/** Unit, frequency, source and notes as published with the national series */
export async function describeIndicator(
  deps: DescribeIndicatorDeps,
  input: GetIndicatorMetadataInput
): Promise<Result<IndicatorMetadataOutput, McpError>> {
  const result = await getIndicatorMetadata(deps, input.indicador_id);
  if (result.isErr()) {
    return err(toMcpError(result.error));
  }
  return ok({ ...result.value });
}

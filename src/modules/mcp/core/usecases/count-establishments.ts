/**
 * MCP Use Case: cuantificar_establecimientos
 */

import { err, ok, type Result } from 'neverthrow';

import { parseAreaCode } from '@/common/types/geo.js';
import { countBySector, parseStratum, STRATA } from '@/modules/registry/index.js';

import { toMcpError, type McpError } from '../errors.js';
import { toScopeOutput } from '../mappers.js';

import type { McpToolDeps } from '../ports.js';
import type { CountEstablishmentsInput, CountEstablishmentsOutput } from '../types.js';

const ALL_SIZES_LABEL = 'Todos los tamaños';

export type CountEstablishmentsDeps = Pick<McpToolDeps, 'registryApi' | 'pageSize' | 'logger'>;

/**
 * Counts establishments of an activity in an area, optionally in one size
 * band. The count comes from the records themselves; the registry's own
 * total and its per-area breakdown are reported next to it.
 */
export async function countEstablishments(
  deps: CountEstablishmentsDeps,
  input: CountEstablishmentsInput
): Promise<Result<CountEstablishmentsOutput, McpError>> {
  const scopeResult = parseAreaCode(input.area_geografica);
  if (scopeResult.isErr()) {
    return err(toMcpError(scopeResult.error));
  }

  const stratumResult = parseStratum(input.estrato);
  if (stratumResult.isErr()) {
    return err(toMcpError(stratumResult.error));
  }
  const stratum = stratumResult.value;

  const countResult = await countBySector(deps, {
    activityCode: input.actividad_economica,
    scope: scopeResult.value,
    stratum,
  });
  if (countResult.isErr()) {
    return err(toMcpError(countResult.error));
  }
  const sectorCount = countResult.value;

  return ok({
    activityCode: sectorCount.sectorCode,
    area: toScopeOutput(sectorCount.area),
    stratum: { code: stratum, label: stratum === '0' ? ALL_SIZES_LABEL : STRATA[stratum] },
    count: sectorCount.count,
    reportedTotal: sectorCount.reportedTotal,
    breakdown: sectorCount.breakdown.map((row) => ({ ...row })),
    truncated: sectorCount.truncated,
    warnings: sectorCount.warnings.map((warning) => ({
      kind: warning.kind,
      message: warning.message,
    })),
  });
}

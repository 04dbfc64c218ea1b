/**
 * Business Aggregator
 *
 * Counts establishments for an activity within an area by exhausting the
 * activity search, then cross-checks the count against the total the
 * registry reports. Disagreements become warnings, never failures.
 * A size band narrows the counted records by their employee-count label.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidParameterError,
  createWarning,
  type InvalidParameterError,
  type QueryError,
  type Warning,
} from '@/common/types/errors.js';

import { collectPages } from '../pagination.js';
import {
  ALL_STRATA,
  MAX_COUNT_RECORDS,
  STRATA,
  type CountBySectorInput,
  type Establishment,
  type QuantifyRow,
  type SectorCount,
  type StratumCode,
} from '../types.js';
import { buildActivityAreaQuery } from './search-by-activity-and-area.js';

import type { RegistrySearchDeps } from '../ports.js';
import type { GeoScope } from '@/common/types/geo.js';
import type { Logger } from 'pino';

export interface CountBySectorDeps extends RegistrySearchDeps {
  logger: Logger;
}

/** Area argument of the quantify endpoint: '0', 'SS' or 'SSMMM' */
export const toQuantifyArea = (scope: GeoScope): string =>
  scope.level === 'national' ? '0' : scope.code;

const isStratumCode = (code: string): code is StratumCode =>
  code === ALL_STRATA || Object.hasOwn(STRATA, code);

/** Blank means every band */
export const parseStratum = (
  raw: string,
  field = 'estrato'
): Result<StratumCode, InvalidParameterError> => {
  const code = raw.trim() === '' ? ALL_STRATA : raw.trim();
  return isStratumCode(code)
    ? ok(code)
    : err(createInvalidParameterError(field, `Size band '${raw}' must be a code from 0 to 7`));
};

const normalizeLabel = (label: string): string => label.replace(/\s+/g, ' ').trim().toLowerCase();

/** Whether a record falls in a size band; every record is in band '0' */
export const inStratum = (establishment: Establishment, stratum: StratumCode): boolean => {
  if (stratum === ALL_STRATA) {
    return true;
  }
  return (
    establishment.stratum !== null &&
    normalizeLabel(establishment.stratum) === normalizeLabel(STRATA[stratum])
  );
};

export const countBySector = async (
  deps: CountBySectorDeps,
  input: CountBySectorInput
): Promise<Result<SectorCount, QueryError>> => {
  const { registryApi, logger } = deps;
  const { scope } = input;
  const stratum = input.stratum ?? ALL_STRATA;

  const queryResult = buildActivityAreaQuery(input.activityCode, scope);
  if (queryResult.isErr()) {
    return err(queryResult.error);
  }
  const query = queryResult.value;
  const sectorCode = query.activity?.code ?? '0';

  const pageResult = await collectPages((window) => registryApi.fetchPage(query, window), {
    limit: MAX_COUNT_RECORDS,
    pageSize: deps.pageSize,
  });
  if (pageResult.isErr()) {
    return err(pageResult.error);
  }
  const page = pageResult.value;
  const count = page.items.filter((establishment) => inStratum(establishment, stratum)).length;

  const warnings: Warning[] = [];
  let truncated = false;

  if (page.failure !== null) {
    truncated = true;
    warnings.push(
      createWarning(
        'PartialResults',
        `Counting stopped after ${String(count)} records: ${page.failure.message}`
      )
    );
  } else if (page.hasMore) {
    truncated = true;
    warnings.push(
      createWarning(
        'CountTruncated',
        `Counting stopped at ${String(MAX_COUNT_RECORDS)} records; narrow the activity or area for an exact count`
      )
    );
  }

  // A page total covers every band, so it only stands in for the registry count without one
  let reportedTotal = stratum === ALL_STRATA ? page.totalAvailable : null;
  let breakdown: readonly QuantifyRow[] = [];
  if (reportedTotal === null) {
    const quantifyArea = toQuantifyArea(scope);
    const quantified = await registryApi.quantify({
      activityCode: sectorCode,
      areaCode: quantifyArea,
      stratum,
    });
    if (quantified.isErr()) {
      logger.warn(
        { sectorCode, area: quantifyArea, stratum, error: quantified.error.type },
        'Reported establishment total unavailable'
      );
      warnings.push(
        createWarning(
          'ReportedTotalUnavailable',
          `The registry total could not be retrieved: ${quantified.error.message}`
        )
      );
    } else {
      reportedTotal = quantified.value.total;
      breakdown = quantified.value.rows;
    }
  }

  if (reportedTotal !== null && !truncated && reportedTotal !== count) {
    warnings.push(
      createWarning(
        'TotalMismatch',
        `Counted ${String(count)} establishments but the registry reports ${String(reportedTotal)}`
      )
    );
  }

  return ok({
    sectorCode,
    area: scope,
    stratum,
    count,
    reportedTotal,
    breakdown,
    warnings,
    truncated,
  });
};

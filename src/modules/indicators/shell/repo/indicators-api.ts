/**
 * Indicator API adapter
 *
 * Speaks the BISE indicator bank's path conventions and turns its payloads
 * into the module's plain types.
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import {
  createMalformedResponseError,
  createNotFoundError,
  isUpstreamError,
  type QueryError,
} from '@/common/types/errors.js';

import type { IndicatorApi, RawObservation, RawSeries, SeriesRequest } from '../../core/ports.js';
import type { CatalogEntry, IndicatorLanguage } from '../../core/types.js';
import type { Credential, HttpClient } from '@/infra/http/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const INDICADORES_TOKEN_ENV = 'INEGI_INDICADORES_TOKEN';

const SOURCE_BANK = 'BISE';
const API_VERSION = '2.0';

/** Body of the upstream 400 answer for an empty selection */
const NO_RESULTS_MARKER = 'No se encontraron resultados';

// ─────────────────────────────────────────────────────────────────────────────
// Payload Schemas
// ─────────────────────────────────────────────────────────────────────────────

const looseText = z.union([z.string(), z.number()]).nullish();

const observationSchema = z
  .object({
    TIME_PERIOD: z.union([z.string(), z.number()]),
    OBS_VALUE: looseText,
  })
  .passthrough();

const seriesSchema = z
  .object({
    FREQ: looseText,
    TOPIC: looseText,
    UNIT: looseText,
    UNIT_MULT: looseText,
    NOTE: looseText,
    SOURCE: looseText,
    LASTUPDATE: looseText,
    OBSERVATIONS: z.array(observationSchema).nullish(),
  })
  .passthrough();

const seriesResponseSchema = z
  .object({
    Series: z.array(seriesSchema).nullish(),
  })
  .passthrough();

const catalogResponseSchema = z
  .object({
    CODE: z
      .array(
        z
          .object({
            value: z.union([z.string(), z.number()]),
            Description: z.string().nullish(),
          })
          .passthrough()
      )
      .nullish(),
  })
  .passthrough();

// ─────────────────────────────────────────────────────────────────────────────
// Mappers
// ─────────────────────────────────────────────────────────────────────────────

const toText = (value: string | number | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text === '' ? null : text;
};

/** Null, blank and non-numeric placeholders become null, never zero */
export const parseObservationValue = (value: string | number | null | undefined): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = toText(value);
  if (text === null) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

const isNoResults = (error: QueryError): boolean =>
  error.type === 'NotFound' ||
  (error.type === 'InvalidParameter' && error.message.includes(NO_RESULTS_MARKER));

const toCatalogEntries = (payload: z.infer<typeof catalogResponseSchema>): CatalogEntry[] =>
  (payload.CODE ?? []).flatMap((row) => {
    const code = toText(row.value);
    if (code === null) {
      return [];
    }
    return [{ code, name: toText(row.Description) ?? code }];
  });

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export interface IndicatorsApiDeps {
  httpClient: HttpClient;
  baseUrl: string;
  token: string | undefined;
  language: IndicatorLanguage;
  logger: Logger;
}

export const makeIndicatorsApi = (deps: IndicatorsApiDeps): IndicatorApi => {
  const { httpClient, baseUrl, language } = deps;
  const log = deps.logger.child({ adapter: 'indicadores' });

  const credential: Credential = {
    api: 'indicadores',
    token: deps.token,
    placement: { kind: 'path' },
    envVar: INDICADORES_TOKEN_ENV,
  };

  const get = async <T>(
    pathSegments: string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Result<T, QueryError>> => {
    const response = await httpClient.getJson({
      baseUrl,
      pathSegments,
      query: { type: 'json' },
      credential,
    });
    if (response.isErr()) {
      if (isUpstreamError(response.error)) {
        log.warn({ path: pathSegments[0], error: response.error.type }, response.error.message);
      }
      return err(response.error);
    }

    const parsed = schema.safeParse(response.value);
    if (!parsed.success) {
      const detail = formatIssues(parsed.error);
      log.warn({ path: pathSegments[0], detail }, 'Unexpected indicator payload');
      return err(createMalformedResponseError('indicadores', detail, parsed.error));
    }
    return ok(parsed.data);
  };

  const catalogPath = (catalog: string, id: string | null): string[] => [
    catalog,
    id ?? 'null',
    language,
    SOURCE_BANK,
    API_VERSION,
  ];

  const describe = async (
    catalog: string,
    code: string
  ): Promise<Result<string | null, QueryError>> => {
    const result = await get(catalogPath(catalog, code), catalogResponseSchema);
    if (result.isErr()) {
      return isNoResults(result.error) ? ok(null) : err(result.error);
    }
    const entry = toCatalogEntries(result.value).find((row) => row.code === code);
    return ok(entry?.name ?? null);
  };

  return {
    async fetchSeries(request: SeriesRequest): Promise<Result<RawSeries, QueryError>> {
      const result = await get(
        [
          'INDICATOR',
          request.code,
          language,
          request.area,
          request.latestOnly ? 'true' : 'false',
          SOURCE_BANK,
          API_VERSION,
        ],
        seriesResponseSchema
      );

      const notFound = createNotFoundError(
        'series',
        `${request.code}@${request.area}`,
        `No data for indicator '${request.code}' in area '${request.area}'`
      );

      if (result.isErr()) {
        return err(isNoResults(result.error) ? notFound : result.error);
      }

      const series = result.value.Series?.[0];
      if (series === undefined) {
        return err(notFound);
      }

      const observations: RawObservation[] = (series.OBSERVATIONS ?? []).map((observation) => ({
        period: String(observation.TIME_PERIOD).trim(),
        value: parseObservationValue(observation.OBS_VALUE),
      }));

      return ok({
        observations,
        unitCode: toText(series.UNIT),
        frequencyCode: toText(series.FREQ),
        unitMultiplier: toText(series.UNIT_MULT),
        topic: toText(series.TOPIC),
        source: toText(series.SOURCE),
        note: toText(series.NOTE),
        lastUpdate: toText(series.LASTUPDATE),
      });
    },

    async lookupCatalogEntry(code: string): Promise<Result<CatalogEntry | null, QueryError>> {
      const result = await get(catalogPath('CL_INDICATOR', code), catalogResponseSchema);
      if (result.isErr()) {
        return isNoResults(result.error) ? ok(null) : err(result.error);
      }
      return ok(toCatalogEntries(result.value).find((entry) => entry.code === code) ?? null);
    },

    async listCatalog(): Promise<Result<CatalogEntry[], QueryError>> {
      const result = await get(catalogPath('CL_INDICATOR', null), catalogResponseSchema);
      return result.map(toCatalogEntries);
    },

    describeUnit(unitCode: string): Promise<Result<string | null, QueryError>> {
      return describe('CL_UNIT', unitCode);
    },

    describeFrequency(frequencyCode: string): Promise<Result<string | null, QueryError>> {
      return describe('CL_FREQ', frequencyCode);
    },
  };
};

/**
 * Registry API adapter (DENUE)
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createMalformedResponseError,
  isUpstreamError,
  type QueryError,
} from '@/common/types/errors.js';

import { activitySlots } from '../../core/activity.js';
import {
  denueListSchema,
  quantifyListSchema,
  text,
  toEstablishments,
  type DenueRecord,
} from './denue-mappers.js';

import type { RegistryApi } from '../../core/ports.js';
import type {
  Establishment,
  PageWindow,
  QuantifyRequest,
  QuantifyResult,
  QuantifyRow,
  RadiusQuery,
  RegistryPage,
  RegistryQuery,
} from '../../core/types.js';
import type { Credential, HttpClient } from '@/infra/http/client.js';
import type { Logger } from 'pino';
import type { z } from 'zod';

export const DENUE_TOKEN_ENV = 'INEGI_DENUE_TOKEN';

/** Slot value the registry reads as "any" */
const ANY = '0';

export interface DenueApiDeps {
  httpClient: HttpClient;
  baseUrl: string;
  token: string | undefined;
  logger: Logger;
}

/** One-based inclusive record range, as the registry numbers records */
const recordRange = (window: PageWindow): [string, string] => [
  String(window.offset + 1),
  String(window.offset + window.count),
];

/** Path segments for a query window */
export const queryPath = (query: RegistryQuery, window: PageWindow): string[] => {
  switch (query.kind) {
    case 'term':
      return ['BuscarEntidad', query.term, query.stateCode, ...recordRange(window)];
    case 'activity-area': {
      const [sector, subsector, rama, clase] = activitySlots(query.activity);
      return [
        'BuscarAreaAct',
        query.stateCode,
        query.municipalityCode,
        ANY, // localidad
        ANY, // AGEB
        ANY, // manzana
        sector,
        subsector,
        rama,
        clase,
        query.name,
        ...recordRange(window),
        ANY, // establishment id
      ];
    }
  }
};

/** Radius searches have no record range: the registry answers with the whole radius */
export const radiusPath = (query: RadiusQuery): string[] => [
  'Buscar',
  query.term,
  `${String(query.lat)},${String(query.lon)}`,
  String(query.radiusMeters),
];

const parseTotal = (value: string | number): number | null => {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
};

export const makeDenueApi = (deps: DenueApiDeps): RegistryApi => {
  const { httpClient, baseUrl } = deps;
  const log = deps.logger.child({ adapter: 'denue' });

  const credential: Credential = {
    api: 'denue',
    token: deps.token,
    placement: { kind: 'path' },
    envVar: DENUE_TOKEN_ENV,
  };

  const get = async <T>(
    pathSegments: string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Result<T, QueryError>> => {
    const response = await httpClient.getJson({ baseUrl, pathSegments, credential });
    if (response.isErr()) {
      if (isUpstreamError(response.error)) {
        log.warn({ path: pathSegments[0], error: response.error.type }, response.error.message);
      }
      return err(response.error);
    }

    const parsed = schema.safeParse(response.value);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      log.warn({ path: pathSegments[0], detail }, 'Unexpected registry payload');
      return err(createMalformedResponseError('denue', detail, parsed.error));
    }
    return ok(parsed.data);
  };

  /** No matches come back as [] or null, and from some endpoints as 404 */
  const getRecords = async (
    pathSegments: string[]
  ): Promise<Result<DenueRecord[], QueryError>> => {
    const result = await get(pathSegments, denueListSchema);
    if (result.isErr()) {
      return result.error.type === 'NotFound' ? ok([]) : err(result.error);
    }
    return ok(result.value ?? []);
  };

  const getEstablishments = async (
    pathSegments: string[]
  ): Promise<Result<Establishment[], QueryError>> => {
    const recordsResult = await getRecords(pathSegments);
    if (recordsResult.isErr()) {
      return err(recordsResult.error);
    }
    const mapped = toEstablishments(recordsResult.value);
    if (mapped.isErr()) {
      return err(mapped.error);
    }
    return ok(mapped.value);
  };

  return {
    async fetchPage(
      query: RegistryQuery,
      window: PageWindow
    ): Promise<Result<RegistryPage, QueryError>> {
      const result = await getEstablishments(queryPath(query, window));
      if (result.isErr()) {
        return err(result.error);
      }
      return ok({ items: result.value, totalAvailable: null });
    },

    async fetchRadius(query: RadiusQuery): Promise<Result<Establishment[], QueryError>> {
      return getEstablishments(radiusPath(query));
    },

    async fetchEstablishment(id: string): Promise<Result<Establishment | null, QueryError>> {
      const result = await getEstablishments(['Ficha', id]);
      if (result.isErr()) {
        return err(result.error);
      }
      return ok(result.value[0] ?? null);
    },

    async quantify(request: QuantifyRequest): Promise<Result<QuantifyResult, QueryError>> {
      const { activityCode, areaCode, stratum } = request;
      const result = await get(
        ['Cuantificar', activityCode, areaCode, stratum],
        quantifyListSchema
      );
      if (result.isErr()) {
        return result.error.type === 'NotFound' ? ok({ total: 0, rows: [] }) : err(result.error);
      }

      const rows: QuantifyRow[] = [];
      let total = 0;
      for (const row of result.value ?? []) {
        const rowTotal = parseTotal(row.Total);
        if (rowTotal === null) {
          return err(
            createMalformedResponseError(
              'denue',
              `non-numeric Total '${String(row.Total)}' for area ${text(row.AG) ?? areaCode}`
            )
          );
        }
        rows.push({
          activityCode: text(row.AE) ?? activityCode,
          areaCode: text(row.AG) ?? areaCode,
          total: rowTotal,
        });
        total += rowTotal;
      }
      return ok({ total, rows });
    },
  };
};

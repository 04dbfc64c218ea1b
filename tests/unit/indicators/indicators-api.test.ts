/**
 * Unit tests for the indicator API adapter
 */

import { describe, expect, it } from 'vitest';

import { makeHttpClient } from '@/infra/http/index.js';
import { createSilentLogger } from '@/infra/logger/index.js';
import {
  makeIndicatorsApi,
  parseObservationValue,
} from '@/modules/indicators/shell/repo/indicators-api.js';

import { makeRecordingFetch, type FakeResponse } from '../../fixtures/fakes.js';

const BASE_URL = 'https://bise.example.test/jsonxml';

const makeApi = (responses: FakeResponse[], token: string | undefined = 'test-secret') => {
  const recording = makeRecordingFetch(responses);
  const logger = createSilentLogger();
  const api = makeIndicatorsApi({
    httpClient: makeHttpClient({ logger, timeoutMs: 1000, fetch: recording.fetch }),
    baseUrl: BASE_URL,
    token,
    language: 'es',
    logger,
  });
  return { api, urls: recording.urls };
};

// ─────────────────────────────────────────────────────────────────────────────
// parseObservationValue
// ─────────────────────────────────────────────────────────────────────────────

describe('parseObservationValue', () => {
  it('parses numeric text and numbers', () => {
    expect(parseObservationValue('126014024.0')).toBe(126014024);
    expect(parseObservationValue(' 3.5 ')).toBe(3.5);
    expect(parseObservationValue(0)).toBe(0);
    expect(parseObservationValue('0')).toBe(0);
  });

  it('turns missing and placeholder values into null, never zero', () => {
    expect(parseObservationValue(null)).toBeNull();
    expect(parseObservationValue(undefined)).toBeNull();
    expect(parseObservationValue('')).toBeNull();
    expect(parseObservationValue('N/D')).toBeNull();
    expect(parseObservationValue(Number.NaN)).toBeNull();
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// fetchSeries
// ─────────────────────────────────────────────────────────────────────────────

describe('fetchSeries', () => {
  it('builds the series path and maps the payload', async () => {
    const body = JSON.stringify({
      Series: [
        {
          FREQ: '7',
          UNIT: 96,
          UNIT_MULT: '',
          SOURCE: 'Censo de Población y Vivienda',
          LASTUPDATE: '25/01/2021',
          OBSERVATIONS: [
            { TIME_PERIOD: '2020', OBS_VALUE: '126014024.0' },
            { TIME_PERIOD: 2010, OBS_VALUE: null },
            { TIME_PERIOD: '2015', OBS_VALUE: 'N/D' },
          ],
        },
      ],
    });
    const { api, urls } = makeApi([{ body }]);

    const result = await api.fetchSeries({ code: '1002000001', area: '00', latestOnly: false });

    expect(urls).toEqual([
      `${BASE_URL}/INDICATOR/1002000001/es/00/false/BISE/2.0/test-secret?type=json`,
    ]);
    expect(result._unsafeUnwrap()).toEqual({
      observations: [
        { period: '2020', value: 126014024 },
        { period: '2010', value: null },
        { period: '2015', value: null },
      ],
      unitCode: '96',
      frequencyCode: '7',
      unitMultiplier: null,
      topic: null,
      source: 'Censo de Población y Vivienda',
      note: null,
      lastUpdate: '25/01/2021',
    });
  });

  it('reads the upstream "no results" answer as NotFound', async () => {
    const { api } = makeApi([{ status: 400, body: '["No se encontraron resultados"]' }]);

    const result = await api.fetchSeries({ code: '444612', area: '31050', latestOnly: true });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFound',
      resource: 'series',
      query: '444612@31050',
      message: "No data for indicator '444612' in area '31050'",
    });
  });

  it('reads an empty series list as NotFound', async () => {
    const { api } = makeApi([{ body: '{"Series":[]}' }]);

    const result = await api.fetchSeries({ code: '444612', area: '00', latestOnly: true });

    expect(result._unsafeUnwrapErr().type).toBe('NotFound');
  });

  it('reports an unexpected payload as MalformedResponse', async () => {
    const { api } = makeApi([{ body: '{"Series":"unavailable"}' }]);

    const result = await api.fetchSeries({ code: '444612', area: '00', latestOnly: true });

    expect(result._unsafeUnwrapErr().type).toBe('MalformedResponse');
  });

  it('fails with MissingCredential without a request when no token is set', async () => {
    const { api, urls } = makeApi([{ body: '{}' }], undefined);

    const result = await api.fetchSeries({ code: '444612', area: '00', latestOnly: true });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'MissingCredential',
      api: 'indicadores',
    });
    expect(urls).toHaveLength(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Catalogs
// ─────────────────────────────────────────────────────────────────────────────

describe('catalog lookups', () => {
  it('looks a single indicator up by code', async () => {
    const { api, urls } = makeApi([
      { body: '{"CODE":[{"value":"1002000001","Description":"Población total"}]}' },
    ]);

    const result = await api.lookupCatalogEntry('1002000001');

    expect(urls).toEqual([
      `${BASE_URL}/CL_INDICATOR/1002000001/es/BISE/2.0/test-secret?type=json`,
    ]);
    expect(result._unsafeUnwrap()).toEqual({ code: '1002000001', name: 'Población total' });
  });

  it('returns null for a code the catalog does not know', async () => {
    const { api } = makeApi([{ status: 404 }]);

    expect((await api.lookupCatalogEntry('9999999999'))._unsafeUnwrap()).toBeNull();
  });

  it('lists the full catalog with a null id', async () => {
    const { api, urls } = makeApi([
      {
        body: JSON.stringify({
          CODE: [
            { value: 1002000001, Description: 'Población total' },
            { value: '444612', Description: 'Tasa de desempleo' },
          ],
        }),
      },
    ]);

    const result = await api.listCatalog();

    expect(urls).toEqual([`${BASE_URL}/CL_INDICATOR/null/es/BISE/2.0/test-secret?type=json`]);
    expect(result._unsafeUnwrap()).toEqual([
      { code: '1002000001', name: 'Población total' },
      { code: '444612', name: 'Tasa de desempleo' },
    ]);
  });

  it('describes unit and frequency codes', async () => {
    const { api, urls } = makeApi([
      { body: '{"CODE":[{"value":"96","Description":"Personas"}]}' },
      { body: '{"CODE":[{"value":"9","Description":"Trimestral"}]}' },
    ]);

    expect((await api.describeUnit('96'))._unsafeUnwrap()).toBe('Personas');
    expect((await api.describeFrequency('9'))._unsafeUnwrap()).toBe('Trimestral');
    expect(urls).toEqual([
      `${BASE_URL}/CL_UNIT/96/es/BISE/2.0/test-secret?type=json`,
      `${BASE_URL}/CL_FREQ/9/es/BISE/2.0/test-secret?type=json`,
    ]);
  });
});

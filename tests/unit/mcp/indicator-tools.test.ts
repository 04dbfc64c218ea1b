/**
 * Unit tests for the indicator MCP tools
 */

import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { createMissingCredentialError } from '@/common/types/errors.js';
import { compareStateIndicator } from '@/modules/mcp/core/usecases/compare-state-indicator.js';
import { describeIndicator } from '@/modules/mcp/core/usecases/describe-indicator.js';
import { getTimeSeries } from '@/modules/mcp/core/usecases/get-time-series.js';
import { listIndicators } from '@/modules/mcp/core/usecases/list-indicators.js';
import { searchCatalog } from '@/modules/mcp/core/usecases/search-catalog.js';
import { searchIndicators } from '@/modules/mcp/core/usecases/search-indicators.js';
import { CURATED_INDICATORS } from '@/modules/indicators/index.js';

import { makeRawSeries } from '../../fixtures/builders.js';
import { makeFakeIndicatorApi } from '../../fixtures/fakes.js';

// ─────────────────────────────────────────────────────────────────────────────
// buscar_indicadores / listar_indicadores_disponibles
// ─────────────────────────────────────────────────────────────────────────────

describe('searchIndicators', () => {
  it('returns curated matches with their category', () => {
    const result = searchIndicators({ keyword: ' desempleo ' });

    expect(result._unsafeUnwrap()).toEqual({
      keyword: 'desempleo',
      total: 1,
      indicators: [
        {
          code: '444612',
          name: 'Tasa de desempleo',
          unit: 'Porcentaje',
          periodicity: 'quarterly',
          coverageLevels: ['national', 'state', 'municipal'],
          category: 'Empleo',
        },
      ],
      suggestions: [],
    });
  });

  it('suggests the whole curated table when nothing matches', () => {
    const output = searchIndicators({ keyword: 'zzzqqq123' })._unsafeUnwrap();

    expect(output.total).toBe(0);
    expect(output.indicators).toEqual([]);
    expect(output.suggestions).toHaveLength(CURATED_INDICATORS.length);
    expect(output.suggestions[0]).toEqual({ code: '1002000001', name: 'Población total' });
  });

  it('rejects a blank keyword', () => {
    expect(searchIndicators({ keyword: '' })._unsafeUnwrapErr()).toEqual({
      code: 'INVALID_INPUT',
      message: 'keyword: A search keyword is required',
    });
  });
});

describe('listIndicators', () => {
  it('totals every curated indicator', () => {
    const output = listIndicators();

    expect(output.total).toBe(CURATED_INDICATORS.length);
    expect(output.categories[0]?.category).toBe('Demografía');
    expect(output.categories[0]?.indicators[0]?.category).toBe('Demografía');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// buscar_catalogo_completo
// ─────────────────────────────────────────────────────────────────────────────

describe('searchCatalog', () => {
  it('returns ranked candidates', async () => {
    const indicatorApi = makeFakeIndicatorApi({
      catalog: [{ code: '6200093973', name: 'Exportaciones totales' }],
    });

    const result = await searchCatalog({ indicatorApi }, { keyword: ' 6200093973 ' });

    expect(result._unsafeUnwrap()).toEqual({
      keyword: '6200093973',
      total: 1,
      candidates: [{ code: '6200093973', name: 'Exportaciones totales', score: 0 }],
    });
  });

  it('reports a missing token', async () => {
    const indicatorApi = makeFakeIndicatorApi({
      catalogError: createMissingCredentialError('indicadores', 'INEGI_INDICADORES_TOKEN'),
    });

    const result = await searchCatalog({ indicatorApi }, { keyword: 'pib', limite: 5 });

    expect(result._unsafeUnwrapErr()).toEqual({
      code: 'MISSING_CREDENTIAL',
      message:
        'No access token configured for the indicadores API. Set INEGI_INDICADORES_TOKEN.',
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// obtener_serie_temporal
// ─────────────────────────────────────────────────────────────────────────────

describe('getTimeSeries', () => {
  it('returns the national series by default', async () => {
    const indicatorApi = makeFakeIndicatorApi({
      series: {
        '444612@00': ok(
          makeRawSeries([['2024/02', null], ['2024/01', 2.6]], { source: 'ENOE' })
        ),
      },
    });

    const result = await getTimeSeries(
      { indicatorApi },
      { indicador_id: '444612', historica: false }
    );

    const output = result._unsafeUnwrap();
    expect(output.resolvedFrom).toBe('curated');
    expect(output.scope).toEqual({
      level: 'national',
      code: '00',
      name: 'Estados Unidos Mexicanos',
    });
    expect(output.points).toEqual([
      { period: '2024/01', value: 2.6 },
      { period: '2024/02', value: null },
    ]);
    expect(output.latest).toEqual({ period: '2024/01', value: 2.6 });
    expect(output.observationCount).toBe(2);
    expect(output.source).toBe('ENOE');
    expect(indicatorApi.seriesRequests).toEqual([
      { code: '444612', area: '00', latestOnly: true },
    ]);
  });

  it('resolves a name and fetches a municipality', async () => {
    const indicatorApi = makeFakeIndicatorApi({
      series: { '1002000001@14039': ok(makeRawSeries([['2020', 1385629]])) },
    });

    const output = (
      await getTimeSeries(
        { indicatorApi },
        { indicador_id: 'Población total', historica: true, codigo_geo: '14039' }
      )
    )._unsafeUnwrap();

    expect(output.indicator.code).toBe('1002000001');
    expect(output.scope.code).toBe('14039');
    expect(indicatorApi.seriesRequests[0]).toEqual({
      code: '1002000001',
      area: '14039',
      latestOnly: false,
    });
  });

  it('rejects a malformed area before resolving the indicator', async () => {
    const indicatorApi = makeFakeIndicatorApi();

    const result = await getTimeSeries(
      { indicatorApi },
      { indicador_id: 'zzzqqq123', historica: false, codigo_geo: '123' }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      code: 'INVALID_INPUT',
      message:
        "codigo_geo: Area code '123' must be '0' (national), a 2-digit state or a 5-digit municipality",
    });
    expect(indicatorApi.listCatalogCalls).toBe(0);
  });

  it('passes the upstream answer through for an area a curated indicator does not publish', async () => {
    const indicatorApi = makeFakeIndicatorApi();

    const result = await getTimeSeries(
      { indicatorApi },
      { indicador_id: '216906', historica: false, codigo_geo: '09' }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      code: 'NOT_FOUND',
      message: "No data for indicator '216906'",
    });
    expect(indicatorApi.seriesRequests).toEqual([
      { code: '216906', area: '09000', latestOnly: true },
    ]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// comparar_estados
// ─────────────────────────────────────────────────────────────────────────────

describe('compareStateIndicator', () => {
  it('returns per-state entries, a ranking and the failure count', async () => {
    const indicatorApi = makeFakeIndicatorApi({
      series: { '444612@09000': ok(makeRawSeries([['2024/01', 2.5]])) },
    });

    const output = (
      await compareStateIndicator(
        { indicatorApi },
        { indicador_id: '444612', estados: ['09', '14'] }
      )
    )._unsafeUnwrap();

    const cdmx = { level: 'state', code: '09', name: 'Ciudad de México' };
    expect(output.entries).toEqual([
      {
        state: cdmx,
        ok: true,
        latest: { period: '2024/01', value: 2.5 },
        points: [{ period: '2024/01', value: 2.5 }],
      },
      {
        state: { level: 'state', code: '14', name: 'Jalisco' },
        ok: false,
        error: { code: 'NOT_FOUND', message: "No data for indicator '444612'" },
      },
    ]);
    expect(output.ranking).toEqual([{ rank: 1, state: cdmx, period: '2024/01', value: 2.5 }]);
    expect(output.failed).toBe(1);
  });

  it('rejects an unknown state code before any request', async () => {
    const indicatorApi = makeFakeIndicatorApi();

    const result = await compareStateIndicator(
      { indicatorApi },
      { indicador_id: '444612', estados: ['09', '99'] }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      code: 'INVALID_INPUT',
      message: "estados: Unknown state code '99'",
    });
    expect(indicatorApi.seriesRequests).toHaveLength(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// obtener_metadatos_indicador
// ─────────────────────────────────────────────────────────────────────────────

describe('describeIndicator', () => {
  it('returns the published metadata', async () => {
    const indicatorApi = makeFakeIndicatorApi({
      series: {
        '444612@00': ok(
          makeRawSeries([['2024/01', 2.6]], { unitCode: '4', source: 'ENOE', note: 'Trimestral' })
        ),
      },
      units: { '4': 'Porcentaje' },
    });

    const output = (
      await describeIndicator({ indicatorApi }, { indicador_id: '444612' })
    )._unsafeUnwrap();

    expect(output).toEqual({
      code: '444612',
      name: 'Tasa de desempleo',
      unit: 'Porcentaje',
      unitMultiplier: null,
      frequency: null,
      topic: null,
      source: 'ENOE',
      lastUpdate: null,
      note: 'Trimestral',
    });
  });
});

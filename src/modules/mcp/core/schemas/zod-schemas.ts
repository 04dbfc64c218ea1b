/**
 * MCP Module - Zod Schemas
 *
 * Zod schemas required by the MCP SDK for tool input validation.
 * Parameter names are part of the public tool contract and stay in Spanish.
 * Range checks live in the use cases so that violations come back as
 * INVALID_INPUT tool results instead of protocol errors.
 */

import { z } from 'zod';

import { DEFAULT_SEARCH_LIMIT } from '@/modules/registry/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Common Schemas
// ─────────────────────────────────────────────────────────────────────────────

const IndicatorIdSchema = z
  .string()
  .describe('Código numérico del indicador (p. ej. "1002000001") o texto a buscar');

const HistoricalSchema = z
  .boolean()
  .describe('true para la serie completa, false solo para el dato más reciente');

const LimitSchema = z
  .number()
  .int()
  .describe('Número máximo de establecimientos a devolver (1-5000)');

const LatitudeSchema = z.number().describe('Latitud en grados decimales');
const LongitudeSchema = z.number().describe('Longitud en grados decimales');
const RadiusSchema = z.number().describe('Radio de búsqueda en metros (máximo 5000)');

// ─────────────────────────────────────────────────────────────────────────────
// Indicator Tools
// ─────────────────────────────────────────────────────────────────────────────

/**
 * buscar_indicadores - Keyword search over the curated indicator table
 */
export const SearchIndicatorsInputZod = z.object({
  keyword: z
    .string()
    .describe('Palabra clave, p. ej. "población", "desempleo", "inflación" o una categoría'),
});

/**
 * buscar_catalogo_completo - Fuzzy search over the full upstream catalog
 */
export const SearchFullCatalogInputZod = z.object({
  keyword: z.string().describe('Texto a buscar en los nombres del catálogo completo'),
  limite: z.number().int().describe('Número máximo de candidatos (1-50, por defecto 10)').optional(),
});

/**
 * obtener_serie_temporal - Time series for one indicator and one area
 */
export const GetTimeSeriesInputZod = z.object({
  indicador_id: IndicatorIdSchema,
  historica: HistoricalSchema.default(false),
  codigo_geo: z
    .string()
    .describe('Área: "00" nacional (por defecto), 2 dígitos estado, 5 dígitos municipio')
    .optional(),
});

/**
 * comparar_estados - Same indicator across several states
 */
export const CompareStatesInputZod = z.object({
  indicador_id: IndicatorIdSchema,
  estados: z
    .array(z.string())
    .describe('Claves de entidad federativa de 2 dígitos, p. ej. ["09", "14", "19"]'),
  historica: HistoricalSchema.optional(),
});

/**
 * listar_indicadores_disponibles - Curated table grouped by category
 */
export const ListIndicatorsInputZod = z.object({});

/**
 * obtener_metadatos_indicador - Unit, frequency, source and notes of an indicator
 */
export const GetIndicatorMetadataInputZod = z.object({
  indicador_id: z.string().describe('Código numérico del indicador'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Registry Tools
// ─────────────────────────────────────────────────────────────────────────────

/**
 * buscar_establecimientos - Term search, optionally by state or around a point
 */
export const SearchEstablishmentsInputZod = z.object({
  termino: z.string().describe('Palabra a buscar en nombre o actividad, p. ej. "farmacia"'),
  limite: LimitSchema.default(DEFAULT_SEARCH_LIMIT),
  entidad: z
    .string()
    .describe('Clave de entidad de 2 dígitos; "00" o vacío para todo el país')
    .optional(),
  latitud: LatitudeSchema.optional(),
  longitud: LongitudeSchema.optional(),
  radio: RadiusSchema.optional(),
});

/**
 * buscar_area_act - Search by area, activity class and name
 */
export const SearchActivityAreaInputZod = z.object({
  entidad: z.string().describe('Clave de entidad de 2 dígitos; "00" para todo el país'),
  municipio: z
    .string()
    .describe('Clave de municipio de 3 dígitos; "0" para todos')
    .default('0'),
  nombre: z.string().describe('Nombre del establecimiento; "0" para cualquiera').default('0'),
  limite: LimitSchema.default(DEFAULT_SEARCH_LIMIT),
  clase: z
    .string()
    .describe('Código SCIAN: sector (2), subsector (3), rama (4) o clase (6 dígitos)')
    .optional(),
});

/**
 * cuantificar_establecimientos - Count establishments by activity and area
 */
export const CountEstablishmentsInputZod = z.object({
  actividad_economica: z
    .string()
    .describe('Código SCIAN de 2, 3, 4 o 6 dígitos; "0" para todas las actividades'),
  area_geografica: z
    .string()
    .describe('"0" nacional, 2 dígitos estado, 5 dígitos municipio'),
  estrato: z
    .string()
    .describe(
      'Tamaño por personal ocupado: "0" todos, "1" 0-5, "2" 6-10, "3" 11-30, "4" 31-50, ' +
        '"5" 51-100, "6" 101-250, "7" 251 y más'
    )
    .default('0'),
});

/**
 * obtener_establecimiento - Full record of one establishment
 */
export const GetEstablishmentInputZod = z.object({
  id_establecimiento: z
    .string()
    .describe('Identificador numérico del establecimiento, como lo devuelven las búsquedas'),
});

/**
 * obtener_coordenadas_establecimientos - Coordinates of matching establishments
 */
export const GetCoordinatesInputZod = z.object({
  termino: z.string().describe('Palabra a buscar en nombre o actividad'),
  limite: LimitSchema.default(5),
  latitud: LatitudeSchema.optional(),
  longitud: LongitudeSchema.optional(),
  radio: RadiusSchema.optional(),
});

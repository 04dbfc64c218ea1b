/**
 * Curated indicator table.
 *
 * Frequently requested indicators, resolvable without a network call.
 */

import { ALL_GEO_LEVELS } from '@/common/types/geo.js';

import type { CuratedIndicator } from './types.js';

// Coverage matches what a live lookup reports; the upstream answers
// NotFound for an area an indicator does not publish.
export const CURATED_INDICATORS: readonly CuratedIndicator[] = [
  // Demografía
  {
    code: '1002000001',
    name: 'Población total',
    unit: 'Personas',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Demografía',
  },
  {
    code: '1002000002',
    name: 'Población femenina',
    unit: 'Personas',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Demografía',
  },
  {
    code: '1002000003',
    name: 'Población masculina',
    unit: 'Personas',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Demografía',
  },
  {
    code: '6200240326',
    name: 'Densidad de población',
    unit: 'Personas por kilómetro cuadrado',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Demografía',
  },

  // Economía
  {
    code: '381016',
    name: 'Producto Interno Bruto (PIB)',
    unit: 'Millones de pesos',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Economía',
  },
  {
    code: '381017',
    name: 'PIB per cápita',
    unit: 'Pesos',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Economía',
  },

  // Empleo
  {
    code: '444612',
    name: 'Tasa de desempleo',
    unit: 'Porcentaje',
    periodicity: 'quarterly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Empleo',
  },
  {
    code: '444603',
    name: 'Tasa de ocupación',
    unit: 'Porcentaje',
    periodicity: 'quarterly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Empleo',
  },
  {
    code: '444604',
    name: 'Población económicamente activa',
    unit: 'Personas',
    periodicity: 'quarterly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Empleo',
  },
  {
    code: '444605',
    name: 'Población ocupada',
    unit: 'Personas',
    periodicity: 'quarterly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Empleo',
  },
  {
    code: '444606',
    name: 'Población desocupada',
    unit: 'Personas',
    periodicity: 'quarterly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Empleo',
  },

  // Precios
  {
    code: '216906',
    name: 'Índice Nacional de Precios al Consumidor (INPC)',
    unit: 'Índice',
    periodicity: 'monthly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Precios',
  },
  {
    code: '216668',
    name: 'Inflación anual',
    unit: 'Porcentaje',
    periodicity: 'monthly',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Precios',
  },

  // Vivienda
  {
    code: '6207019887',
    name: 'Número de viviendas particulares habitadas',
    unit: 'Viviendas',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Vivienda',
  },
  {
    code: '6207019888',
    name: 'Promedio de ocupantes por vivienda',
    unit: 'Personas por vivienda',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Vivienda',
  },

  // Educación
  {
    code: '1002000022',
    name: 'Grado promedio de escolaridad',
    unit: 'Años',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Educación',
  },
  {
    code: '1002000023',
    name: 'Porcentaje de población analfabeta',
    unit: 'Porcentaje',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Educación',
  },

  // Salud
  {
    code: '6200028214',
    name: 'Tasa de mortalidad infantil',
    unit: 'Defunciones por cada mil nacidos vivos',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Salud',
  },
  {
    code: '6200028221',
    name: 'Esperanza de vida al nacimiento',
    unit: 'Años',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Salud',
  },

  // Desarrollo social
  {
    code: '628194',
    name: 'Índice de rezago social',
    unit: 'Índice',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Desarrollo social',
  },
  {
    code: '628195',
    name: 'Índice de marginación',
    unit: 'Índice',
    periodicity: 'annual',
    coverageLevels: ALL_GEO_LEVELS,
    category: 'Desarrollo social',
  },
];

const BY_CODE = new Map(CURATED_INDICATORS.map((indicator) => [indicator.code, indicator]));

export const findCuratedByCode = (code: string): CuratedIndicator | undefined =>
  BY_CODE.get(code);

/** Lowercases and strips diacritics so "poblacion" matches "Población" */
export const normalizeText = (text: string): string =>
  text
    .normalize('NFD')
    .replace(/[̀-ͯ]/g, '')
    .toLowerCase()
    .trim();

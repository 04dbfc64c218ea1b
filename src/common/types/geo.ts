/**
 * Geographic scopes shared by the indicator and registry modules.
 *
 * Codes follow the national geostatistical framework: two-digit state codes
 * (01-32) and five-digit municipal codes (state + three-digit municipality).
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type InvalidParameterError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type GeoLevel = 'national' | 'state' | 'municipal';

export const ALL_GEO_LEVELS: readonly GeoLevel[] = ['national', 'state', 'municipal'];

export interface GeoScope {
  readonly level: GeoLevel;
  /** '00' for national, 'SS' for states, 'SSMMM' for municipalities */
  readonly code: string;
  readonly name: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// State Table
// ─────────────────────────────────────────────────────────────────────────────

export const NATIONAL_CODE = '00';
export const NATIONAL_NAME = 'Estados Unidos Mexicanos';

export const STATE_NAMES: Readonly<Record<string, string>> = {
  '01': 'Aguascalientes',
  '02': 'Baja California',
  '03': 'Baja California Sur',
  '04': 'Campeche',
  '05': 'Coahuila',
  '06': 'Colima',
  '07': 'Chiapas',
  '08': 'Chihuahua',
  '09': 'Ciudad de México',
  '10': 'Durango',
  '11': 'Guanajuato',
  '12': 'Guerrero',
  '13': 'Hidalgo',
  '14': 'Jalisco',
  '15': 'México',
  '16': 'Michoacán',
  '17': 'Morelos',
  '18': 'Nayarit',
  '19': 'Nuevo León',
  '20': 'Oaxaca',
  '21': 'Puebla',
  '22': 'Querétaro',
  '23': 'Quintana Roo',
  '24': 'San Luis Potosí',
  '25': 'Sinaloa',
  '26': 'Sonora',
  '27': 'Tabasco',
  '28': 'Tamaulipas',
  '29': 'Tlaxcala',
  '30': 'Veracruz',
  '31': 'Yucatán',
  '32': 'Zacatecas',
};

export const NATIONAL_SCOPE: GeoScope = {
  level: 'national',
  code: NATIONAL_CODE,
  name: NATIONAL_NAME,
};

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds a state scope. Accepts one- or two-digit codes ('1' → '01').
 */
export const stateScope = (
  rawCode: string,
  field = 'entidad'
): Result<GeoScope, InvalidParameterError> => {
  const trimmed = rawCode.trim();
  if (!/^\d{1,2}$/.test(trimmed)) {
    return err(
      createInvalidParameterError(field, `State code '${rawCode}' must be a number from 01 to 32`)
    );
  }

  const code = trimmed.padStart(2, '0');
  const name = STATE_NAMES[code];
  if (name === undefined) {
    return err(createInvalidParameterError(field, `Unknown state code '${code}'`));
  }

  return ok({ level: 'state', code, name });
};

/**
 * Builds a municipal scope from its state and three-digit municipality code.
 */
export const municipalScope = (
  rawStateCode: string,
  rawMunicipalityCode: string,
  field = 'municipio'
): Result<GeoScope, InvalidParameterError> => {
  return stateScope(rawStateCode).andThen((state) => {
    const trimmed = rawMunicipalityCode.trim();
    if (!/^\d{1,3}$/.test(trimmed) || Number.parseInt(trimmed, 10) === 0) {
      return err(
        createInvalidParameterError(
          field,
          `Municipality code '${rawMunicipalityCode}' must be a number from 001 to 999`
        )
      );
    }
    const municipality = trimmed.padStart(3, '0');
    return ok({
      level: 'municipal' as const,
      code: `${state.code}${municipality}`,
      name: `Municipio ${municipality}, ${state.name}`,
    });
  });
};

/**
 * Parses a compact area code: '0'/'00' national, 1-2 digits state,
 * 5 digits municipality.
 */
export const parseAreaCode = (
  rawCode: string,
  field = 'area_geografica'
): Result<GeoScope, InvalidParameterError> => {
  const trimmed = rawCode.trim();

  if (trimmed === '' || /^0{1,2}$/.test(trimmed)) {
    return ok(NATIONAL_SCOPE);
  }
  if (/^\d{1,2}$/.test(trimmed)) {
    return stateScope(trimmed, field);
  }
  if (/^\d{5}$/.test(trimmed)) {
    return municipalScope(trimmed.slice(0, 2), trimmed.slice(2), field);
  }

  return err(
    createInvalidParameterError(
      field,
      `Area code '${rawCode}' must be '0' (national), a 2-digit state or a 5-digit municipality`
    )
  );
};

/**
 * Re-validates a scope built elsewhere: the code must match its level and
 * name a known state.
 */
export const validateScope = (
  scope: GeoScope,
  field = 'codigo_geo'
): Result<GeoScope, InvalidParameterError> => {
  switch (scope.level) {
    case 'national':
      return scope.code === NATIONAL_CODE
        ? ok(scope)
        : err(createInvalidParameterError(field, `National scope code must be '${NATIONAL_CODE}'`));
    case 'state':
      return /^\d{2}$/.test(scope.code)
        ? stateScope(scope.code, field)
        : err(createInvalidParameterError(field, `State code '${scope.code}' must have 2 digits`));
    case 'municipal':
      return /^\d{5}$/.test(scope.code)
        ? municipalScope(scope.code.slice(0, 2), scope.code.slice(2), field)
        : err(
            createInvalidParameterError(
              field,
              `Municipal code '${scope.code}' must have 5 digits (state + municipality)`
            )
          );
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Accessors
// ─────────────────────────────────────────────────────────────────────────────

/** Two-digit state code enclosing the scope, or null for national scope */
export const stateCodeOf = (scope: GeoScope): string | null =>
  scope.level === 'national' ? null : scope.code.slice(0, 2);

/** Three-digit municipality code, or null above municipal level */
export const municipalityCodeOf = (scope: GeoScope): string | null =>
  scope.level === 'municipal' ? scope.code.slice(2) : null;

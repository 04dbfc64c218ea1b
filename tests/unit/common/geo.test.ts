/**
 * Unit tests for geographic scopes
 */

import { describe, expect, it } from 'vitest';

import {
  NATIONAL_SCOPE,
  municipalScope,
  municipalityCodeOf,
  parseAreaCode,
  stateCodeOf,
  stateScope,
  validateScope,
} from '@/common/types/geo.js';

describe('stateScope', () => {
  it('pads one-digit codes', () => {
    expect(stateScope('9')._unsafeUnwrap()).toEqual({
      level: 'state',
      code: '09',
      name: 'Ciudad de México',
    });
  });

  it('rejects codes outside 01-32 naming the field', () => {
    expect(stateScope('33', 'estados')._unsafeUnwrapErr()).toEqual({
      type: 'InvalidParameter',
      field: 'estados',
      message: "Unknown state code '33'",
    });
    expect(stateScope('00')._unsafeUnwrapErr().message).toBe("Unknown state code '00'");
  });

  it('rejects non-numeric codes', () => {
    expect(stateScope('JAL')._unsafeUnwrapErr().message).toBe(
      "State code 'JAL' must be a number from 01 to 32"
    );
  });
});

describe('municipalScope', () => {
  it('joins state and padded municipality codes', () => {
    expect(municipalScope('14', '39')._unsafeUnwrap()).toEqual({
      level: 'municipal',
      code: '14039',
      name: 'Municipio 039, Jalisco',
    });
  });

  it('rejects municipality 000', () => {
    expect(municipalScope('14', '000')._unsafeUnwrapErr().field).toBe('municipio');
  });
});

describe('parseAreaCode', () => {
  it('reads 0, 00 and blank as national', () => {
    expect(parseAreaCode('0')._unsafeUnwrap()).toEqual(NATIONAL_SCOPE);
    expect(parseAreaCode('00')._unsafeUnwrap()).toEqual(NATIONAL_SCOPE);
    expect(parseAreaCode(' ')._unsafeUnwrap()).toEqual(NATIONAL_SCOPE);
  });

  it('reads two digits as a state', () => {
    expect(parseAreaCode('31')._unsafeUnwrap().name).toBe('Yucatán');
  });

  it('reads five digits as a municipality', () => {
    const scope = parseAreaCode('31050')._unsafeUnwrap();

    expect(scope.level).toBe('municipal');
    expect(scope.code).toBe('31050');
  });

  it('rejects other lengths', () => {
    expect(parseAreaCode('123', 'codigo_geo')._unsafeUnwrapErr()).toEqual({
      type: 'InvalidParameter',
      field: 'codigo_geo',
      message:
        "Area code '123' must be '0' (national), a 2-digit state or a 5-digit municipality",
    });
  });

  it('rejects an unknown state inside a municipal code', () => {
    expect(parseAreaCode('40001')._unsafeUnwrapErr().message).toBe("Unknown state code '40'");
  });
});

describe('validateScope', () => {
  it('accepts well-formed scopes', () => {
    expect(validateScope(NATIONAL_SCOPE).isOk()).toBe(true);
    expect(validateScope({ level: 'state', code: '14', name: 'Jalisco' }).isOk()).toBe(true);
  });

  it('rejects a code that does not match its level', () => {
    expect(
      validateScope({ level: 'state', code: '14039', name: 'Jalisco' })._unsafeUnwrapErr().message
    ).toBe("State code '14039' must have 2 digits");
    expect(
      validateScope({ level: 'national', code: '01', name: 'x' })._unsafeUnwrapErr().message
    ).toBe("National scope code must be '00'");
  });
});

describe('scope accessors', () => {
  it('extracts state and municipality codes', () => {
    const municipal = municipalScope('14', '039')._unsafeUnwrap();

    expect(stateCodeOf(municipal)).toBe('14');
    expect(municipalityCodeOf(municipal)).toBe('039');
    expect(stateCodeOf(NATIONAL_SCOPE)).toBeNull();
    expect(municipalityCodeOf(stateScope('14')._unsafeUnwrap())).toBeNull();
  });
});

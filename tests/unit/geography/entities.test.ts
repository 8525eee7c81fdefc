import { describe, it, expect } from 'vitest';

import {
  createCountry,
  createDivision,
  createUrban,
  DIVISION_KINDS,
  isDivisionKind,
  isTransient,
  isUrbanKind,
  MAX_NAME_LENGTH,
  parseDivisionKind,
  parseUrbanKind,
  URBAN_KINDS,
  type ConstructionError,
} from '@/modules/geography/index.js';

import { makeCountryInput, makeDivisionInput, makeUrbanInput } from '../../fixtures/builders.js';

const issueFields = (error: ConstructionError): string[] =>
  error.type === 'AttributeValidationError' ? error.issues.map((i) => i.field) : [];

describe('createCountry', () => {
  it('round-trips every attribute', () => {
    const result = createCountry({
      id: 764,
      iso: 'TH',
      callingCode: 66,
      name: 'Thailand',
      native: 'ไทย',
      population: 69950850,
    });

    expect(result.isOk()).toBe(true);
    const country = result._unsafeUnwrap();
    expect(country.id).toBe(764);
    expect(country.iso).toBe('TH');
    expect(country.callingCode).toBe(66);
    expect(country.name).toBe('Thailand');
    expect(country.native).toBe('ไทย');
    expect(country.population).toBe(69950850);
    expect(country.kind).toBe('Country');
    expect(country.family).toBe('country');
    expect(isTransient(country)).toBe(false);
  });

  it('returns a frozen value', () => {
    const country = createCountry(makeCountryInput())._unsafeUnwrap();
    expect(Object.isFrozen(country)).toBe(true);
  });

  it('accepts a population of zero', () => {
    expect(createCountry(makeCountryInput({ population: 0 })).isOk()).toBe(true);
  });

  describe('name length boundary', () => {
    it(`accepts exactly ${String(MAX_NAME_LENGTH)} characters`, () => {
      const name = 'a'.repeat(100);
      const result = createCountry(makeCountryInput({ name }));

      expect(result._unsafeUnwrap().name).toBe(name);
    });

    it('rejects 101 characters without truncating', () => {
      const result = createCountry(makeCountryInput({ name: 'a'.repeat(101) }));

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('AttributeValidationError');
      expect(issueFields(error)).toEqual(['name']);
    });

    it('applies the same limit to native names in non-Latin scripts', () => {
      expect(createCountry(makeCountryInput({ native: 'ก'.repeat(100) })).isOk()).toBe(true);

      const error = createCountry(
        makeCountryInput({ native: 'ก'.repeat(101) })
      )._unsafeUnwrapErr();
      expect(issueFields(error)).toEqual(['native']);
    });

    it('counts UTF-16 code units, so astral characters count twice', () => {
      const clef = '\u{1D11E}';
      expect(clef.length).toBe(2);

      const fits = createCountry(makeCountryInput({ native: clef.repeat(50) }));
      expect(fits._unsafeUnwrap().native).toBe(clef.repeat(50));

      const error = createCountry(
        makeCountryInput({ native: clef.repeat(51) })
      )._unsafeUnwrapErr();
      expect(issueFields(error)).toEqual(['native']);
    });
  });

  it('rejects empty required text', () => {
    const error = createCountry(makeCountryInput({ name: '' }))._unsafeUnwrapErr();
    expect(issueFields(error)).toEqual(['name']);
  });

  it('rejects a negative population', () => {
    const error = createCountry(makeCountryInput({ population: -1 }))._unsafeUnwrapErr();
    expect(issueFields(error)).toEqual(['population']);
  });

  it('rejects a fractional population instead of rounding it', () => {
    const error = createCountry(makeCountryInput({ population: 10.5 }))._unsafeUnwrapErr();
    expect(issueFields(error)).toEqual(['population']);
  });

  it('requires a two-letter uppercase ISO code', () => {
    expect(createCountry(makeCountryInput({ iso: 'th' })).isErr()).toBe(true);
    expect(createCountry(makeCountryInput({ iso: 'THA' })).isErr()).toBe(true);
    expect(createCountry(makeCountryInput({ iso: 'T' })).isErr()).toBe(true);
  });

  it('reports every failing field at once', () => {
    const error = createCountry(makeCountryInput({ name: '', population: -5 }))._unsafeUnwrapErr();

    expect(error.type).toBe('AttributeValidationError');
    expect(issueFields(error)).toEqual(expect.arrayContaining(['name', 'population']));
    expect(error.message.startsWith('Invalid Country: ')).toBe(true);
  });
});

describe('createDivision', () => {
  it('builds every division kind with the same shape', () => {
    expect(DIVISION_KINDS).toHaveLength(27);

    for (const kind of DIVISION_KINDS) {
      const division = createDivision(kind, makeDivisionInput())._unsafeUnwrap();
      expect(division.kind).toBe(kind);
      expect(division.family).toBe('division');
      expect(division.countryId).toBe(764);
    }
  });

  it('does not resolve countryId', () => {
    const result = createDivision('Province', makeDivisionInput({ countryId: 9999 }));

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap().countryId).toBe(9999);
  });

  it('requires countryId to point at a persisted row', () => {
    const error = createDivision(
      'Province',
      makeDivisionInput({ countryId: 0 })
    )._unsafeUnwrapErr();
    expect(issueFields(error)).toEqual(['countryId']);
  });

  it('accepts subdivision codes of up to three characters', () => {
    expect(createDivision('Province', makeDivisionInput({ iso: 'BKK' })).isOk()).toBe(true);
    expect(createDivision('Prefecture', makeDivisionInput({ iso: '13' })).isOk()).toBe(true);

    const error = createDivision(
      'Province',
      makeDivisionInput({ iso: 'BKKX' })
    )._unsafeUnwrapErr();
    expect(issueFields(error)).toEqual(['iso']);
  });

  it('rejects a name over the limit', () => {
    const error = createDivision(
      'State',
      makeDivisionInput({ name: 'x'.repeat(101) })
    )._unsafeUnwrapErr();
    expect(error.type).toBe('AttributeValidationError');
    expect(issueFields(error)).toEqual(['name']);
  });
});

describe('createUrban', () => {
  it('builds every urban kind', () => {
    expect(URBAN_KINDS).toHaveLength(7);

    for (const kind of URBAN_KINDS) {
      const urban = createUrban(kind, makeUrbanInput())._unsafeUnwrap();
      expect(urban.kind).toBe(kind);
      expect(urban.family).toBe('urban');
      expect(urban.divisionId).toBe(10);
    }
  });

  it('bounds iso at five characters', () => {
    expect(createUrban('Ward', makeUrbanInput({ iso: '13104' })).isOk()).toBe(true);

    const error = createUrban('Ward', makeUrbanInput({ iso: '131040' }))._unsafeUnwrapErr();
    expect(issueFields(error)).toEqual(['iso']);
  });

  it('does not resolve divisionId', () => {
    expect(createUrban('Village', makeUrbanInput({ divisionId: 123456 })).isOk()).toBe(true);
  });
});

describe('kind parsing', () => {
  it('accepts known discriminator values', () => {
    expect(isDivisionKind('Voivodeship')).toBe(true);
    expect(isUrbanKind('Hamlet')).toBe(true);
    expect(parseDivisionKind('Banat')._unsafeUnwrap()).toBe('Banat');
    expect(parseUrbanKind('Amphor')._unsafeUnwrap()).toBe('Amphor');
  });

  it('keeps the two families apart', () => {
    expect(isDivisionKind('City')).toBe(false);
    expect(isUrbanKind('Province')).toBe(false);
  });

  it('is case-sensitive', () => {
    expect(isDivisionKind('province')).toBe(false);
  });

  it('returns UnknownKindError for anything else', () => {
    const error = parseDivisionKind('Duchy')._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'UnknownKindError',
      message: "'Duchy' is not a known division kind",
      family: 'division',
      kind: 'Duchy',
    });
    expect(parseUrbanKind('Metropolis')._unsafeUnwrapErr().family).toBe('urban');
  });
});

import { describe, it, expect } from 'vitest';

import { createCountry, createDivision, createUrban } from '@/modules/geography/index.js';
import {
  countryToRow,
  divisionToRow,
  rowToCountry,
  rowToDivision,
  rowToUrban,
  urbanToRow,
} from '@/modules/geography/shell/repo/row-mapper.js';

import { makeCountryInput, makeDivisionInput, makeUrbanInput } from '../../fixtures/builders.js';

describe('row mapping', () => {
  it('maps a country to snake_case columns', () => {
    const country = createCountry(makeCountryInput())._unsafeUnwrap();

    expect(countryToRow(country)).toEqual({
      id: 764,
      iso: 'TH',
      calling_code: 66,
      name: 'Thailand',
      native: 'ไทย',
      population: 69950850,
    });
  });

  it('stores the division variant in the type column', () => {
    const division = createDivision('District', makeDivisionInput())._unsafeUnwrap();

    expect(divisionToRow(division)).toEqual({
      id: 10,
      type: 'District',
      country_id: 764,
      iso: 'NBI',
      name: 'Nonthaburi',
      native: 'นนทบุรี',
      population: 1288637,
    });
  });

  it('stores the urban variant in the type column', () => {
    const urban = createUrban('Ward', makeUrbanInput())._unsafeUnwrap();

    expect(urbanToRow(urban)).toEqual({
      id: 20,
      type: 'Ward',
      division_id: 10,
      name: 'Pak Kret',
      native: 'ปากเกร็ด',
      iso: 'PKT',
    });
  });

  it('reads rows back into equal entities', () => {
    const country = createCountry(makeCountryInput())._unsafeUnwrap();
    const division = createDivision('Province', makeDivisionInput())._unsafeUnwrap();
    const urban = createUrban('City', makeUrbanInput())._unsafeUnwrap();

    expect(rowToCountry({ ...countryToRow(country), id: 764 })._unsafeUnwrap()).toEqual(country);
    expect(rowToDivision({ ...divisionToRow(division), id: 10 })._unsafeUnwrap()).toEqual(division);
    expect(rowToUrban({ ...urbanToRow(urban), id: 20 })._unsafeUnwrap()).toEqual(urban);
  });

  it('rejects a row with an unknown discriminator', () => {
    const error = rowToUrban({
      id: 1,
      type: 'Metropolis',
      division_id: 2,
      name: 'Somewhere',
      native: 'Somewhere',
      iso: 'SW',
    })._unsafeUnwrapErr();

    expect(error.type).toBe('UnknownKindError');
  });

  it('rejects a row that breaks an attribute limit', () => {
    const error = rowToDivision({
      id: 1,
      type: 'Province',
      country_id: 764,
      iso: 'BKK',
      name: 'b'.repeat(101),
      native: 'กรุงเทพมหานคร',
      population: 5471588,
    })._unsafeUnwrapErr();

    expect(error.type).toBe('AttributeValidationError');
    if (error.type === 'AttributeValidationError') {
      expect(error.issues.map((i) => i.field)).toEqual(['name']);
    }
  });
});

/**
 * Test data builders
 * Provide valid defaults; override only what a test is about
 */

import type { CountryInput, DivisionInput, UrbanInput } from '@/modules/geography/index.js';

export const makeCountryInput = (overrides: Partial<CountryInput> = {}): CountryInput => ({
  id: 764,
  iso: 'TH',
  callingCode: 66,
  name: 'Thailand',
  native: 'ไทย',
  population: 69950850,
  ...overrides,
});

export const makeDivisionInput = (overrides: Partial<DivisionInput> = {}): DivisionInput => ({
  id: 10,
  countryId: 764,
  iso: 'NBI',
  name: 'Nonthaburi',
  native: 'นนทบุรี',
  population: 1288637,
  ...overrides,
});

export const makeUrbanInput = (overrides: Partial<UrbanInput> = {}): UrbanInput => ({
  id: 20,
  divisionId: 10,
  name: 'Pak Kret',
  native: 'ปากเกร็ด',
  iso: 'PKT',
  ...overrides,
});

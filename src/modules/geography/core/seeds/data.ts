/**
 * Hand-authored seed entries.
 *
 * Ids are durable: division `countryId` and urban `divisionId` values point
 * at entries in this file. Population figures are census or registry counts.
 */

import type {
  CountryInput,
  DivisionInput,
  DivisionKind,
  UrbanInput,
  UrbanKind,
} from '../types.js';

export type DivisionSeedInput = DivisionInput & { readonly kind: DivisionKind };
export type UrbanSeedInput = UrbanInput & { readonly kind: UrbanKind };

export const COUNTRY_SEEDS: readonly CountryInput[] = [
  {
    id: 764,
    iso: 'TH',
    callingCode: 66,
    name: 'Thailand',
    native: 'ไทย',
    population: 69950850,
  },
  {
    id: 392,
    iso: 'JP',
    callingCode: 81,
    name: 'Japan',
    native: '日本',
    population: 126146099,
  },
  {
    id: 840,
    iso: 'US',
    callingCode: 1,
    name: 'United States',
    native: 'United States',
    population: 331449281,
  },
];

export const DIVISION_SEEDS: readonly DivisionSeedInput[] = [
  {
    kind: 'Province',
    id: 1,
    countryId: 764,
    iso: 'BKK',
    name: 'Bangkok',
    native: 'กรุงเทพมหานคร',
    population: 5471588,
  },
  {
    kind: 'Province',
    id: 2,
    countryId: 764,
    iso: 'CMI',
    name: 'Chiang Mai',
    native: 'เชียงใหม่',
    population: 1797074,
  },
  {
    kind: 'Prefecture',
    id: 3,
    countryId: 392,
    iso: '13',
    name: 'Tokyo',
    native: '東京都',
    population: 14047594,
  },
  {
    kind: 'State',
    id: 4,
    countryId: 840,
    iso: 'CA',
    name: 'California',
    native: 'California',
    population: 39538223,
  },
];

export const URBAN_SEEDS: readonly UrbanSeedInput[] = [
  {
    kind: 'City',
    id: 1,
    divisionId: 2,
    name: 'Chiang Mai',
    native: 'เชียงใหม่',
    iso: 'CNX',
  },
  {
    kind: 'City',
    id: 2,
    divisionId: 4,
    name: 'Los Angeles',
    native: 'Los Angeles',
    iso: 'LA',
  },
  {
    kind: 'Ward',
    id: 3,
    divisionId: 3,
    name: 'Shinjuku',
    native: '新宿区',
    iso: '13104',
  },
  {
    kind: 'Amphor',
    id: 4,
    divisionId: 2,
    name: 'Mueang Chiang Mai',
    native: 'เมืองเชียงใหม่',
    iso: '5001',
  },
];

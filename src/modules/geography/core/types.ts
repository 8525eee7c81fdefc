/**
 * Domain types for the geography module.
 *
 * Three entity families form a strict tree: a Country owns Divisions
 * (provinces, states, prefectures, ...) and a Division owns Urbans
 * (cities, towns, wards, ...). Variants within a family share one shape and
 * differ only by their `kind` tag, which is also the discriminator persisted
 * next to the row.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Maximum length of `name` and `native`, counted in UTF-16 code units */
export const MAX_NAME_LENGTH = 100;

/** ISO 3166-1 alpha-2 */
export const COUNTRY_ISO_LENGTH = 2;

/** Subdivision code length (the part after the country prefix) */
export const MAX_DIVISION_ISO_LENGTH = 3;

export const MAX_URBAN_ISO_LENGTH = 5;

/**
 * Division variants. Adding a classification label is a one-line change here.
 */
export const DIVISION_KINDS = [
  'Province',
  'State',
  'Region',
  'County',
  'Canton',
  'District',
  'Municipality',
  'Territory',
  'Prefecture',
  'Department',
  'Area',
  'Community',
  'Parish',
  'Oblast',
  'Voivodeship',
  'Banner',
  'Barangay',
  'Kampong',
  'Barony',
  'Hundred',
  'Kingdom',
  'Principality',
  'Regency',
  'Republic',
  'Riding',
  'Theme',
  'Banat',
] as const;

/**
 * Urban variants.
 */
export const URBAN_KINDS = ['City', 'Town', 'Ward', 'Shire', 'Amphor', 'Village', 'Hamlet'] as const;

export type DivisionKind = (typeof DIVISION_KINDS)[number];
export type UrbanKind = (typeof URBAN_KINDS)[number];

/** Country is a closed family with a single variant */
export type CountryKind = 'Country';

export type EntityFamily = 'country' | 'division' | 'urban';

// ─────────────────────────────────────────────────────────────────────────────
// Entity Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Identifier types usable for entities. Each has a default value
 * (`0`, `0n`, `''`) that marks an entity as transient.
 */
export type Identifier = number | bigint | string;

/**
 * Shape shared by every entity: a typed id plus the variant tag used for
 * identity comparison.
 */
export interface Entity<TId extends Identifier = number, TKind extends string = string> {
  readonly family: EntityFamily;
  readonly kind: TKind;
  readonly id: TId;
}

export interface Country extends Entity<number, CountryKind> {
  readonly family: 'country';
  /** ISO 3166-1 alpha-2 code */
  readonly iso: string;
  /** International dialling prefix, without the leading '+' */
  readonly callingCode: number;
  /** English name */
  readonly name: string;
  /** Name in the local script */
  readonly native: string;
  readonly population: number;
}

export interface Division<K extends DivisionKind = DivisionKind> extends Entity<number, K> {
  readonly family: 'division';
  readonly countryId: number;
  readonly iso: string;
  readonly name: string;
  readonly native: string;
  readonly population: number;
}

export interface Urban<K extends UrbanKind = UrbanKind> extends Entity<number, K> {
  readonly family: 'urban';
  readonly divisionId: number;
  readonly name: string;
  readonly native: string;
  readonly iso: string;
}

export type GeographyEntity = Country | Division | Urban;

// ─────────────────────────────────────────────────────────────────────────────
// Construction Inputs
// ─────────────────────────────────────────────────────────────────────────────

/** Omitting `id` creates a transient entity */
export interface CountryInput {
  id?: number;
  iso: string;
  callingCode: number;
  name: string;
  native: string;
  population: number;
}

export interface DivisionInput {
  id?: number;
  countryId: number;
  iso: string;
  name: string;
  native: string;
  population: number;
}

export interface UrbanInput {
  id?: number;
  divisionId: number;
  name: string;
  native: string;
  iso: string;
}

/**
 * Entity construction.
 *
 * Every constructor validates the full attribute set and returns a frozen
 * value, so holding a Country/Division/Urban implies its attributes are
 * valid. Nothing is truncated or coerced.
 */

import { err, ok, type Result } from 'neverthrow';

import { createUnknownKindError, type ConstructionError, type UnknownKindError } from './errors.js';
import {
  checkAttributes,
  CountryAttributesSchema,
  DivisionAttributesSchema,
  UrbanAttributesSchema,
} from './schemas.js';
import {
  DIVISION_KINDS,
  URBAN_KINDS,
  type Country,
  type CountryInput,
  type Division,
  type DivisionInput,
  type DivisionKind,
  type Urban,
  type UrbanInput,
  type UrbanKind,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Kind Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isDivisionKind = (value: string): value is DivisionKind =>
  DIVISION_KINDS.some((kind) => kind === value);

export const isUrbanKind = (value: string): value is UrbanKind =>
  URBAN_KINDS.some((kind) => kind === value);

/**
 * Reads a stored discriminator value as a division kind.
 */
export const parseDivisionKind = (value: string): Result<DivisionKind, UnknownKindError> =>
  isDivisionKind(value) ? ok(value) : err(createUnknownKindError('division', value));

/**
 * Reads a stored discriminator value as an urban kind.
 */
export const parseUrbanKind = (value: string): Result<UrbanKind, UnknownKindError> =>
  isUrbanKind(value) ? ok(value) : err(createUnknownKindError('urban', value));

// ─────────────────────────────────────────────────────────────────────────────
// Attribute Builders
//
// Shared by the public constructors and the persistence drafts. `attributes`
// is unchecked input; the schema check narrows it.
// ─────────────────────────────────────────────────────────────────────────────

export const countryFromAttributes = (attributes: unknown): Result<Country, ConstructionError> =>
  checkAttributes(CountryAttributesSchema, 'country', 'Country', attributes).map((a) => {
    const country: Country = {
      family: 'country',
      kind: 'Country',
      id: a.id,
      iso: a.iso,
      callingCode: a.callingCode,
      name: a.name,
      native: a.native,
      population: a.population,
    };
    return Object.freeze(country);
  });

export const divisionFromAttributes = <K extends DivisionKind>(
  kind: K,
  attributes: unknown
): Result<Division<K>, ConstructionError> => {
  if (!isDivisionKind(kind)) {
    return err(createUnknownKindError('division', kind));
  }

  return checkAttributes(DivisionAttributesSchema, 'division', kind, attributes).map((a) => {
    const division: Division<K> = {
      family: 'division',
      kind,
      id: a.id,
      countryId: a.countryId,
      iso: a.iso,
      name: a.name,
      native: a.native,
      population: a.population,
    };
    return Object.freeze(division);
  });
};

export const urbanFromAttributes = <K extends UrbanKind>(
  kind: K,
  attributes: unknown
): Result<Urban<K>, ConstructionError> => {
  if (!isUrbanKind(kind)) {
    return err(createUnknownKindError('urban', kind));
  }

  return checkAttributes(UrbanAttributesSchema, 'urban', kind, attributes).map((a) => {
    const urban: Urban<K> = {
      family: 'urban',
      kind,
      id: a.id,
      divisionId: a.divisionId,
      name: a.name,
      native: a.native,
      iso: a.iso,
    };
    return Object.freeze(urban);
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Public Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Country. Omitting `id` yields a transient entity.
 *
 * @example
 * createCountry({ id: 764, iso: 'TH', callingCode: 66, name: 'Thailand', native: 'ไทย', population: 69950850 })
 */
export const createCountry = (input: CountryInput): Result<Country, ConstructionError> =>
  countryFromAttributes({
    id: input.id ?? 0,
    iso: input.iso,
    callingCode: input.callingCode,
    name: input.name,
    native: input.native,
    population: input.population,
  });

/**
 * Creates a Division of the given kind.
 *
 * `countryId` is not resolved here; the loader checks references.
 */
export const createDivision = <K extends DivisionKind>(
  kind: K,
  input: DivisionInput
): Result<Division<K>, ConstructionError> =>
  divisionFromAttributes(kind, {
    id: input.id ?? 0,
    countryId: input.countryId,
    iso: input.iso,
    name: input.name,
    native: input.native,
    population: input.population,
  });

/**
 * Creates an Urban of the given kind.
 */
export const createUrban = <K extends UrbanKind>(
  kind: K,
  input: UrbanInput
): Result<Urban<K>, ConstructionError> =>
  urbanFromAttributes(kind, {
    id: input.id ?? 0,
    divisionId: input.divisionId,
    name: input.name,
    native: input.native,
    iso: input.iso,
  });

// ─────────────────────────────────────────────────────────────────────────────
// Re-validation
//
// Entity types are structural, so a value typed as an entity may not have
// come from a constructor. These rebuild it from its attributes.
// ─────────────────────────────────────────────────────────────────────────────

export const revalidateCountry = (country: Country): Result<Country, ConstructionError> =>
  countryFromAttributes({
    id: country.id,
    iso: country.iso,
    callingCode: country.callingCode,
    name: country.name,
    native: country.native,
    population: country.population,
  });

export const revalidateDivision = (division: Division): Result<Division, ConstructionError> =>
  parseDivisionKind(division.kind).andThen((kind) =>
    divisionFromAttributes(kind, {
      id: division.id,
      countryId: division.countryId,
      iso: division.iso,
      name: division.name,
      native: division.native,
      population: division.population,
    })
  );

export const revalidateUrban = (urban: Urban): Result<Urban, ConstructionError> =>
  parseUrbanKind(urban.kind).andThen((kind) =>
    urbanFromAttributes(kind, {
      id: urban.id,
      divisionId: urban.divisionId,
      name: urban.name,
      native: urban.native,
      iso: urban.iso,
    })
  );

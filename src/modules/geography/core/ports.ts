/**
 * Port interfaces for the geography module.
 *
 * The storage layer owns identifier assignment, referential integrity and
 * uniqueness; the core only hands it validated, frozen values.
 */

import type { ConstructionError, DatabaseError } from './errors.js';
import type { Country, Division, DivisionKind, Urban, UrbanKind } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Reading a row can fail in storage or in re-validating what was stored.
 */
export type StoreReadError = DatabaseError | ConstructionError;

export interface DivisionFilter {
  countryId?: number;
  kind?: DivisionKind;
}

export interface UrbanFilter {
  divisionId?: number;
  kind?: UrbanKind;
}

/**
 * Store the seed datasets are written to.
 */
export interface GeographyStore {
  /**
   * Inserts or replaces countries by id.
   *
   * @returns Number of rows written
   */
  upsertCountries(countries: readonly Country[]): Promise<Result<number, DatabaseError>>;

  /**
   * Inserts or replaces divisions by id, persisting `kind` as the discriminator.
   */
  upsertDivisions(divisions: readonly Division[]): Promise<Result<number, DatabaseError>>;

  upsertUrbans(urbans: readonly Urban[]): Promise<Result<number, DatabaseError>>;

  /**
   * Returns the subset of `ids` that already exist as countries.
   */
  findExistingCountryIds(ids: readonly number[]): Promise<Result<Set<number>, DatabaseError>>;

  /**
   * Returns the subset of `ids` that already exist as divisions.
   */
  findExistingDivisionIds(ids: readonly number[]): Promise<Result<Set<number>, DatabaseError>>;

  getCountryById(id: number): Promise<Result<Country | null, StoreReadError>>;

  /**
   * Lists divisions ordered by id.
   */
  listDivisions(filter: DivisionFilter): Promise<Result<Division[], StoreReadError>>;

  /**
   * Lists urbans ordered by id.
   */
  listUrbans(filter: UrbanFilter): Promise<Result<Urban[], StoreReadError>>;
}

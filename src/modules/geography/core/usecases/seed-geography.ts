/**
 * Seed Geography Use Case
 *
 * Writes a bundle of countries, divisions and urbans to a store, parents
 * first. Entity types are structural, so every entry is re-validated and the
 * rebuilt values are what gets written. This is the loader, so it is where
 * cross-dataset references are checked: a division's country and an urban's
 * division must exist either in the same bundle or already in the store.
 */

import { err, ok, Result } from 'neverthrow';

import { revalidateCountry, revalidateDivision, revalidateUrban } from '../entities.js';
import {
  createDuplicateIdentifierError,
  createMissingReferenceError,
  createTransientEntityError,
  type ConstructionError,
  type SeedError,
} from '../errors.js';
import { isTransient } from '../identity.js';

import type { GeographyStore } from '../ports.js';
import type { SeedBundle } from '../seeds/index.js';
import type { GeographyEntity } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SeedGeographyDeps {
  store: GeographyStore;
  logger: Logger;
}

export interface SeedGeographyInput {
  bundle: SeedBundle;
}

/**
 * Rows written per family.
 */
export interface SeedGeographyResult {
  countries: number;
  divisions: number;
  urbans: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Checks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Every entry needs a durable id, unique within its family.
 */
const checkIdentifiers = (entities: readonly GeographyEntity[]): Result<Set<number>, SeedError> => {
  const seen = new Set<number>();
  for (const entity of entities) {
    if (isTransient(entity)) {
      return err(createTransientEntityError(entity.family, entity.kind));
    }
    if (seen.has(entity.id)) {
      return err(createDuplicateIdentifierError(entity.family, entity.id));
    }
    seen.add(entity.id);
  }
  return ok(seen);
};

const rejectEntry = (log: Logger, error: ConstructionError): Result<never, SeedError> => {
  log.warn({ error }, 'Invalid seed entry');
  return err(error);
};

/**
 * References not satisfied by the bundle itself, in first-seen order.
 */
const unresolved = (references: readonly number[], local: Set<number>): number[] => [
  ...new Set(references.filter((id) => !local.has(id))),
];

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const seedGeography = async (
  deps: SeedGeographyDeps,
  input: SeedGeographyInput
): Promise<Result<SeedGeographyResult, SeedError>> => {
  const { store, logger } = deps;
  const { bundle } = input;

  const log = logger.child({ usecase: 'seedGeography' });

  const countriesResult = Result.combine(bundle.countries.map(revalidateCountry));
  if (countriesResult.isErr()) return rejectEntry(log, countriesResult.error);
  const countries = countriesResult.value;

  const divisionsResult = Result.combine(bundle.divisions.map(revalidateDivision));
  if (divisionsResult.isErr()) return rejectEntry(log, divisionsResult.error);
  const divisions = divisionsResult.value;

  const urbansResult = Result.combine(bundle.urbans.map(revalidateUrban));
  if (urbansResult.isErr()) return rejectEntry(log, urbansResult.error);
  const urbans = urbansResult.value;

  const countryIdsResult = checkIdentifiers(countries);
  if (countryIdsResult.isErr()) return err(countryIdsResult.error);

  const divisionIdsResult = checkIdentifiers(divisions);
  if (divisionIdsResult.isErr()) return err(divisionIdsResult.error);

  const urbanIdsResult = checkIdentifiers(urbans);
  if (urbanIdsResult.isErr()) return err(urbanIdsResult.error);

  // Division → Country
  const missingCountryIds = unresolved(
    divisions.map((d) => d.countryId),
    countryIdsResult.value
  );
  if (missingCountryIds.length > 0) {
    const existing = await store.findExistingCountryIds(missingCountryIds);
    if (existing.isErr()) return err(existing.error);

    const orphan = divisions.find(
      (d) => !countryIdsResult.value.has(d.countryId) && !existing.value.has(d.countryId)
    );
    if (orphan !== undefined) {
      log.warn({ divisionId: orphan.id, countryId: orphan.countryId }, 'Unresolved country');
      return err(createMissingReferenceError('division', orphan.id, 'countryId', orphan.countryId));
    }
  }

  // Urban → Division
  const missingDivisionIds = unresolved(
    urbans.map((u) => u.divisionId),
    divisionIdsResult.value
  );
  if (missingDivisionIds.length > 0) {
    const existing = await store.findExistingDivisionIds(missingDivisionIds);
    if (existing.isErr()) return err(existing.error);

    const orphan = urbans.find(
      (u) => !divisionIdsResult.value.has(u.divisionId) && !existing.value.has(u.divisionId)
    );
    if (orphan !== undefined) {
      log.warn({ urbanId: orphan.id, divisionId: orphan.divisionId }, 'Unresolved division');
      return err(createMissingReferenceError('urban', orphan.id, 'divisionId', orphan.divisionId));
    }
  }

  const countriesWritten = await store.upsertCountries(countries);
  if (countriesWritten.isErr()) return err(countriesWritten.error);

  const divisionsWritten = await store.upsertDivisions(divisions);
  if (divisionsWritten.isErr()) return err(divisionsWritten.error);

  const urbansWritten = await store.upsertUrbans(urbans);
  if (urbansWritten.isErr()) return err(urbansWritten.error);

  const result: SeedGeographyResult = {
    countries: countriesWritten.value,
    divisions: divisionsWritten.value,
    urbans: urbansWritten.value,
  };

  log.info(result, 'Seeded geography');

  return ok(result);
};

/**
 * Entity ⇄ row mapping.
 *
 * Rows are read back through the persistence drafts, so a row that breaks an
 * attribute constraint (or carries an unknown discriminator) surfaces as a
 * ConstructionError instead of an invalid entity.
 */

import { draftCountry, draftDivision, draftUrban } from '../../core/draft.js';

import type { ConstructionError } from '../../core/errors.js';
import type { Country, Division, Urban } from '../../core/types.js';
import type { Countries, Divisions, Urbans } from '../../../../infra/database/client.js';
import type { Insertable, Selectable } from 'kysely';
import type { Result } from 'neverthrow';

export type CountryRow = Selectable<Countries>;
export type DivisionRow = Selectable<Divisions>;
export type UrbanRow = Selectable<Urbans>;

// ─────────────────────────────────────────────────────────────────────────────
// Entity → Row
// ─────────────────────────────────────────────────────────────────────────────

export const countryToRow = (country: Country): Insertable<Countries> => ({
  id: country.id,
  iso: country.iso,
  calling_code: country.callingCode,
  name: country.name,
  native: country.native,
  population: country.population,
});

export const divisionToRow = (division: Division): Insertable<Divisions> => ({
  id: division.id,
  type: division.kind,
  country_id: division.countryId,
  iso: division.iso,
  name: division.name,
  native: division.native,
  population: division.population,
});

export const urbanToRow = (urban: Urban): Insertable<Urbans> => ({
  id: urban.id,
  type: urban.kind,
  division_id: urban.divisionId,
  name: urban.name,
  native: urban.native,
  iso: urban.iso,
});

// ─────────────────────────────────────────────────────────────────────────────
// Row → Entity
// ─────────────────────────────────────────────────────────────────────────────

export const rowToCountry = (row: CountryRow): Result<Country, ConstructionError> =>
  draftCountry()
    .set('id', row.id)
    .set('iso', row.iso)
    .set('callingCode', row.calling_code)
    .set('name', row.name)
    .set('native', row.native)
    .set('population', row.population)
    .build();

export const rowToDivision = (row: DivisionRow): Result<Division, ConstructionError> =>
  draftDivision(row.type)
    .set('id', row.id)
    .set('countryId', row.country_id)
    .set('iso', row.iso)
    .set('name', row.name)
    .set('native', row.native)
    .set('population', row.population)
    .build();

export const rowToUrban = (row: UrbanRow): Result<Urban, ConstructionError> =>
  draftUrban(row.type)
    .set('id', row.id)
    .set('divisionId', row.division_id)
    .set('name', row.name)
    .set('native', row.native)
    .set('iso', row.iso)
    .build();

/**
 * Geography Repository Implementation
 *
 * Kysely-based store for seeding and reading countries, divisions and urbans.
 * Identifier assignment, foreign keys and uniqueness are enforced by the
 * database schema, not here.
 */

import { ok, err, Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';
import {
  countryToRow,
  divisionToRow,
  rowToCountry,
  rowToDivision,
  rowToUrban,
  urbanToRow,
} from './row-mapper.js';

import type {
  DivisionFilter,
  GeographyStore,
  StoreReadError,
  UrbanFilter,
} from '../../core/ports.js';
import type { Country, Division, Urban } from '../../core/types.js';
import type { GeographyDbClient } from '../../../../infra/database/client.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Rows per INSERT statement */
const INSERT_CHUNK_SIZE = 1000;

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyGeographyRepo implements GeographyStore {
  constructor(private readonly db: GeographyDbClient) {}

  async upsertCountries(countries: readonly Country[]): Promise<Result<number, DatabaseError>> {
    try {
      for (const batch of chunk(countries, INSERT_CHUNK_SIZE)) {
        await this.db
          .insertInto('countries')
          .values(batch.map(countryToRow))
          .onConflict((oc) =>
            oc.column('id').doUpdateSet((eb) => ({
              iso: eb.ref('excluded.iso'),
              calling_code: eb.ref('excluded.calling_code'),
              name: eb.ref('excluded.name'),
              native: eb.ref('excluded.native'),
              population: eb.ref('excluded.population'),
            }))
          )
          .execute();
      }
      return ok(countries.length);
    } catch (error) {
      return err(createDatabaseError('Country upsert failed', error));
    }
  }

  async upsertDivisions(divisions: readonly Division[]): Promise<Result<number, DatabaseError>> {
    try {
      for (const batch of chunk(divisions, INSERT_CHUNK_SIZE)) {
        await this.db
          .insertInto('divisions')
          .values(batch.map(divisionToRow))
          .onConflict((oc) =>
            oc.column('id').doUpdateSet((eb) => ({
              type: eb.ref('excluded.type'),
              country_id: eb.ref('excluded.country_id'),
              iso: eb.ref('excluded.iso'),
              name: eb.ref('excluded.name'),
              native: eb.ref('excluded.native'),
              population: eb.ref('excluded.population'),
            }))
          )
          .execute();
      }
      return ok(divisions.length);
    } catch (error) {
      return err(createDatabaseError('Division upsert failed', error));
    }
  }

  async upsertUrbans(urbans: readonly Urban[]): Promise<Result<number, DatabaseError>> {
    try {
      for (const batch of chunk(urbans, INSERT_CHUNK_SIZE)) {
        await this.db
          .insertInto('urbans')
          .values(batch.map(urbanToRow))
          .onConflict((oc) =>
            oc.column('id').doUpdateSet((eb) => ({
              type: eb.ref('excluded.type'),
              division_id: eb.ref('excluded.division_id'),
              name: eb.ref('excluded.name'),
              native: eb.ref('excluded.native'),
              iso: eb.ref('excluded.iso'),
            }))
          )
          .execute();
      }
      return ok(urbans.length);
    } catch (error) {
      return err(createDatabaseError('Urban upsert failed', error));
    }
  }

  async findExistingCountryIds(
    ids: readonly number[]
  ): Promise<Result<Set<number>, DatabaseError>> {
    if (ids.length === 0) {
      return ok(new Set());
    }

    try {
      const rows = await this.db
        .selectFrom('countries')
        .select('id')
        .where('id', 'in', [...ids])
        .execute();
      return ok(new Set(rows.map((r) => r.id)));
    } catch (error) {
      return err(createDatabaseError('Country id lookup failed', error));
    }
  }

  async findExistingDivisionIds(
    ids: readonly number[]
  ): Promise<Result<Set<number>, DatabaseError>> {
    if (ids.length === 0) {
      return ok(new Set());
    }

    try {
      const rows = await this.db
        .selectFrom('divisions')
        .select('id')
        .where('id', 'in', [...ids])
        .execute();
      return ok(new Set(rows.map((r) => r.id)));
    } catch (error) {
      return err(createDatabaseError('Division id lookup failed', error));
    }
  }

  async getCountryById(id: number): Promise<Result<Country | null, StoreReadError>> {
    try {
      const row = await this.db
        .selectFrom('countries')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return rowToCountry(row);
    } catch (error) {
      return err(createDatabaseError('Country getById failed', error));
    }
  }

  async listDivisions(filter: DivisionFilter): Promise<Result<Division[], StoreReadError>> {
    try {
      let query = this.db.selectFrom('divisions').selectAll();

      if (filter.countryId !== undefined) {
        query = query.where('country_id', '=', filter.countryId);
      }
      if (filter.kind !== undefined) {
        query = query.where('type', '=', filter.kind);
      }

      const rows = await query.orderBy('id').execute();
      return Result.combine(rows.map(rowToDivision));
    } catch (error) {
      return err(createDatabaseError('Division list failed', error));
    }
  }

  async listUrbans(filter: UrbanFilter): Promise<Result<Urban[], StoreReadError>> {
    try {
      let query = this.db.selectFrom('urbans').selectAll();

      if (filter.divisionId !== undefined) {
        query = query.where('division_id', '=', filter.divisionId);
      }
      if (filter.kind !== undefined) {
        query = query.where('type', '=', filter.kind);
      }

      const rows = await query.orderBy('id').execute();
      return Result.combine(rows.map(rowToUrban));
    } catch (error) {
      return err(createDatabaseError('Urban list failed', error));
    }
  }
}

/**
 * Factory function to create a Geography Repository.
 */
export const makeGeographyRepo = (db: GeographyDbClient): GeographyStore => {
  return new KyselyGeographyRepo(db);
};

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { GeographyDatabase } from './geography/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type GeographyDbClient = Kysely<GeographyDatabase>;

/**
 * Create a Kysely instance for the configured database
 */
export const initDatabase = (config: AppConfig): GeographyDbClient => {
  const { url, poolMax } = config.database;

  if (url === undefined || url === '') {
    throw new Error('Missing configuration for the geography database (DATABASE_URL)');
  }

  return new Kysely<GeographyDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: url,
        max: poolMax,
      }),
    }),
  });
};

export type { GeographyDatabase, Countries, Divisions, Urbans } from './geography/types.js';

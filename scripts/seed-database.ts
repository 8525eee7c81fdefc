/**
 * Seed Database Script
 *
 * Writes every shipped seed dataset (countries, divisions, urbans) to the
 * database named by DATABASE_URL. Rows are upserted by id, so the script can
 * be re-run. The tables must already exist.
 *
 * Usage:
 *   tsx scripts/seed-database.ts            # seed the configured database
 *   tsx scripts/seed-database.ts --dry-run  # list datasets, touch nothing
 */

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  collectSeedBundle,
  listSeedDatasets,
  makeGeographyRepo,
  seedGeography,
} from '../src/modules/geography/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const dryRun = process.argv.includes('--dry-run');

  for (const dataset of listSeedDatasets()) {
    logger.info({ dataset: dataset.name, size: dataset.size }, 'Seed dataset');
  }

  if (dryRun) {
    logger.info('Dry run, nothing written');
    return;
  }

  const db = initDatabase(config);

  try {
    const result = await seedGeography(
      { store: makeGeographyRepo(db), logger },
      { bundle: collectSeedBundle() }
    );

    if (result.isErr()) {
      logger.error({ error: result.error }, result.error.message);
      process.exitCode = 1;
    }
  } finally {
    await db.destroy();
  }
};

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

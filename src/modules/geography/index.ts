/**
 * Geography Module Public API
 *
 * Exports types, constructors, identity helpers, seed datasets, use cases and
 * the Kysely store.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Entity,
  EntityFamily,
  Identifier,
  Country,
  CountryKind,
  CountryInput,
  Division,
  DivisionKind,
  DivisionInput,
  Urban,
  UrbanKind,
  UrbanInput,
  GeographyEntity,
} from './core/types.js';

export {
  DIVISION_KINDS,
  URBAN_KINDS,
  MAX_NAME_LENGTH,
  COUNTRY_ISO_LENGTH,
  MAX_DIVISION_ISO_LENGTH,
  MAX_URBAN_ISO_LENGTH,
} from './core/types.js';

export {
  CountryAttributesSchema,
  DivisionAttributesSchema,
  UrbanAttributesSchema,
  type CountryAttributes,
  type DivisionAttributes,
  type UrbanAttributes,
} from './core/schemas.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  GeographyError,
  ConstructionError,
  SeedError,
  AttributeIssue,
  AttributeValidationError,
  UnknownKindError,
  MissingReferenceError,
  DuplicateIdentifierError,
  TransientEntityError,
  DatabaseError,
} from './core/errors.js';

export { createDatabaseError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Identity & Construction
// ─────────────────────────────────────────────────────────────────────────────

export { isDefaultIdentifier, isTransient, entityEquals, entityHash } from './core/identity.js';

export {
  createCountry,
  createDivision,
  createUrban,
  isDivisionKind,
  isUrbanKind,
  parseDivisionKind,
  parseUrbanKind,
} from './core/entities.js';

// ─────────────────────────────────────────────────────────────────────────────
// Seed Datasets
// ─────────────────────────────────────────────────────────────────────────────

export {
  getSeedCatalog,
  getCountrySeeds,
  getDivisionSeeds,
  getUrbanSeeds,
  getSeedDataset,
  listSeedDatasets,
  collectSeedBundle,
  type SeedCatalog,
  type SeedDatasetInfo,
  type SeedBundle,
} from './core/seeds/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { GeographyStore, DivisionFilter, UrbanFilter, StoreReadError } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  seedGeography,
  type SeedGeographyDeps,
  type SeedGeographyInput,
  type SeedGeographyResult,
} from './core/usecases/seed-geography.js';

// ─────────────────────────────────────────────────────────────────────────────
// Repositories
// ─────────────────────────────────────────────────────────────────────────────

export { makeGeographyRepo } from './shell/repo/geography-repo.js';

/**
 * Seed datasets
 *
 * Built once, on first access, from the entries in `data.ts`, then frozen.
 * A dataset holds the entities of one concrete variant in authored order.
 * Cross-dataset references are not checked here; the seeding use case does
 * that before anything reaches a store.
 */

import { createCountry, createDivision, createUrban } from '../entities.js';
import { DIVISION_KINDS, URBAN_KINDS } from '../types.js';
import { COUNTRY_SEEDS, DIVISION_SEEDS, URBAN_SEEDS } from './data.js';

import type { ConstructionError } from '../errors.js';
import type {
  Country,
  Division,
  DivisionKind,
  EntityFamily,
  GeographyEntity,
  Urban,
  UrbanKind,
} from '../types.js';
import type { Result } from 'neverthrow';

/**
 * Frozen at every level: the catalog, each per-kind record and each dataset.
 */
export interface SeedCatalog {
  readonly countries: readonly Country[];
  readonly divisions: Readonly<Partial<Record<DivisionKind, readonly Division[]>>>;
  readonly urbans: Readonly<Partial<Record<UrbanKind, readonly Urban[]>>>;
}

export interface SeedDatasetInfo {
  /** `country`, or `<family>:<Kind>` such as `division:Province` */
  name: string;
  family: EntityFamily;
  kind: string;
  size: number;
}

/**
 * Everything a loader needs to bootstrap a store, parents before children.
 */
export interface SeedBundle {
  countries: readonly Country[];
  divisions: readonly Division[];
  urbans: readonly Urban[];
}

const EMPTY: readonly never[] = Object.freeze([]);

const orThrow = <T>(result: Result<T, ConstructionError>): T => {
  if (result.isErr()) {
    throw new Error(`Invalid seed entry: ${result.error.message}`);
  }
  return result.value;
};

const groupByKind = <K extends string, E extends { kind: K }>(
  kinds: readonly K[],
  entities: readonly E[]
): Readonly<Partial<Record<K, readonly E[]>>> => {
  const groups: Partial<Record<K, readonly E[]>> = {};
  for (const kind of kinds) {
    const members = entities.filter((entity) => entity.kind === kind);
    if (members.length > 0) {
      groups[kind] = Object.freeze(members);
    }
  }
  return Object.freeze(groups);
};

const buildCatalog = (): SeedCatalog => {
  const countries = Object.freeze(COUNTRY_SEEDS.map((input) => orThrow(createCountry(input))));

  const divisions = DIVISION_SEEDS.map(({ kind, ...input }) =>
    orThrow(createDivision(kind, input))
  );

  const urbans = URBAN_SEEDS.map(({ kind, ...input }) => orThrow(createUrban(kind, input)));

  return Object.freeze({
    countries,
    divisions: groupByKind(DIVISION_KINDS, divisions),
    urbans: groupByKind(URBAN_KINDS, urbans),
  });
};

let catalog: SeedCatalog | undefined;

/**
 * Returns the process-wide seed catalog, building it on the first call.
 */
export const getSeedCatalog = (): SeedCatalog => {
  catalog ??= buildCatalog();
  return catalog;
};

// ─────────────────────────────────────────────────────────────────────────────
// Accessors
// ─────────────────────────────────────────────────────────────────────────────

export const getCountrySeeds = (): readonly Country[] => getSeedCatalog().countries;

export const getDivisionSeeds = (kind: DivisionKind): readonly Division[] =>
  getSeedCatalog().divisions[kind] ?? EMPTY;

export const getUrbanSeeds = (kind: UrbanKind): readonly Urban[] =>
  getSeedCatalog().urbans[kind] ?? EMPTY;

const findDivisions = (seeds: SeedCatalog, kind: string | undefined): readonly Division[] => {
  const match = DIVISION_KINDS.find((k) => k === kind);
  return match === undefined ? EMPTY : (seeds.divisions[match] ?? EMPTY);
};

const findUrbans = (seeds: SeedCatalog, kind: string | undefined): readonly Urban[] => {
  const match = URBAN_KINDS.find((k) => k === kind);
  return match === undefined ? EMPTY : (seeds.urbans[match] ?? EMPTY);
};

/**
 * Looks a dataset up by family and variant name. Unknown or unseeded kinds
 * give an empty dataset.
 */
export function getSeedDataset(family: 'country'): readonly Country[];
export function getSeedDataset(family: 'division', kind: string): readonly Division[];
export function getSeedDataset(family: 'urban', kind: string): readonly Urban[];
export function getSeedDataset(family: EntityFamily, kind?: string): readonly GeographyEntity[] {
  const seeds = getSeedCatalog();
  switch (family) {
    case 'country':
      return seeds.countries;
    case 'division':
      return findDivisions(seeds, kind);
    case 'urban':
      return findUrbans(seeds, kind);
  }
}

/**
 * Describes every non-empty dataset, countries first.
 */
export const listSeedDatasets = (): SeedDatasetInfo[] => {
  const seeds = getSeedCatalog();
  const infos: SeedDatasetInfo[] = [
    { name: 'country', family: 'country', kind: 'Country', size: seeds.countries.length },
  ];

  for (const kind of DIVISION_KINDS) {
    const members = seeds.divisions[kind];
    if (members !== undefined) {
      infos.push({ name: `division:${kind}`, family: 'division', kind, size: members.length });
    }
  }
  for (const kind of URBAN_KINDS) {
    const members = seeds.urbans[kind];
    if (members !== undefined) {
      infos.push({ name: `urban:${kind}`, family: 'urban', kind, size: members.length });
    }
  }

  return infos;
};

/**
 * Collects every shipped dataset into one bundle.
 */
export const collectSeedBundle = (): SeedBundle => {
  const seeds = getSeedCatalog();
  return {
    countries: seeds.countries,
    divisions: DIVISION_KINDS.flatMap((kind): readonly Division[] => seeds.divisions[kind] ?? EMPTY),
    urbans: URBAN_KINDS.flatMap((kind): readonly Urban[] => seeds.urbans[kind] ?? EMPTY),
  };
};

import type { Generated } from 'kysely';

// Table-per-hierarchy mapping: every variant of a family shares one table and
// `type` holds the variant name. Column limits follow the entity schemas.

// Countries Table
export interface Countries {
  id: Generated<number>; // SERIAL
  iso: string; // CHAR(2), unique
  calling_code: number;
  name: string; // VARCHAR(100)
  native: string; // VARCHAR(100), UTF-8
  population: number; // CHECK (population >= 0)
}

// Divisions Table
export interface Divisions {
  id: Generated<number>; // SERIAL
  type: string; // discriminator: Province, State, ...
  country_id: number; // FK countries(id)
  iso: string; // VARCHAR(3), unique per (country_id, iso)
  name: string; // VARCHAR(100)
  native: string; // VARCHAR(100), UTF-8
  population: number;
}

// Urbans Table
export interface Urbans {
  id: Generated<number>; // SERIAL
  type: string; // discriminator: City, Town, ...
  division_id: number; // FK divisions(id)
  name: string; // VARCHAR(100)
  native: string; // VARCHAR(100), UTF-8
  iso: string; // VARCHAR(5)
}

export interface GeographyDatabase {
  countries: Countries;
  divisions: Divisions;
  urbans: Urbans;
}

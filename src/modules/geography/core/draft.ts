/**
 * Two-phase construction for the persistence boundary.
 *
 * A storage mapper allocates an empty draft, copies column values in one at
 * a time, then calls `build()`, which applies the same validation as the
 * public constructors. Not exported from the module index; only the row
 * mapper uses drafts.
 */

import {
  countryFromAttributes,
  divisionFromAttributes,
  parseDivisionKind,
  parseUrbanKind,
  urbanFromAttributes,
} from './entities.js';

import type { ConstructionError } from './errors.js';
import type {
  Country,
  CountryInput,
  Division,
  DivisionInput,
  Urban,
  UrbanInput,
} from './types.js';
import type { Result } from 'neverthrow';

export interface Draft<TFields, TEntity> {
  /** Sets one field; later calls overwrite earlier ones */
  set<F extends keyof TFields>(field: F, value: TFields[F]): Draft<TFields, TEntity>;
  /** Validates the collected fields. Unset fields fail as missing. */
  build(): Result<TEntity, ConstructionError>;
}

export type CountryDraft = Draft<Required<CountryInput>, Country>;
export type DivisionDraft = Draft<Required<DivisionInput>, Division>;
export type UrbanDraft = Draft<Required<UrbanInput>, Urban>;

const makeDraft = <TFields, TEntity>(
  finish: (fields: Partial<TFields>) => Result<TEntity, ConstructionError>
): Draft<TFields, TEntity> => {
  const fields: Partial<TFields> = {};

  const draft: Draft<TFields, TEntity> = {
    set<F extends keyof TFields>(field: F, value: TFields[F]) {
      fields[field] = value;
      return draft;
    },
    build() {
      return finish({ ...fields });
    },
  };

  return draft;
};

export const draftCountry = (): CountryDraft =>
  makeDraft<Required<CountryInput>, Country>((fields) =>
    countryFromAttributes({ id: 0, ...fields })
  );

/**
 * @param kind - stored discriminator value; checked on `build()`
 */
export const draftDivision = (kind: string): DivisionDraft =>
  makeDraft<Required<DivisionInput>, Division>((fields) =>
    parseDivisionKind(kind).andThen((k) =>
      divisionFromAttributes(k, { id: 0, ...fields })
    )
  );

/**
 * @param kind - stored discriminator value; checked on `build()`
 */
export const draftUrban = (kind: string): UrbanDraft =>
  makeDraft<Required<UrbanInput>, Urban>((fields) =>
    parseUrbanKind(kind).andThen((k) => urbanFromAttributes(k, { id: 0, ...fields }))
  );

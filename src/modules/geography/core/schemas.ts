/**
 * TypeBox schemas for entity attributes.
 *
 * These are the validation contract at the construction boundary; the
 * storage column limits in `infra/database/geography/types.ts` mirror them.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  createAttributeValidationError,
  type AttributeIssue,
  type AttributeValidationError,
} from './errors.js';
import {
  COUNTRY_ISO_LENGTH,
  MAX_DIVISION_ISO_LENGTH,
  MAX_NAME_LENGTH,
  MAX_URBAN_ISO_LENGTH,
  type EntityFamily,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Field Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** Signed 32-bit range, 0 meaning "not assigned yet" */
export const IdSchema = Type.Integer({ minimum: 0, maximum: 2_147_483_647 });

/** A foreign key always points at a persisted row */
export const ReferenceSchema = Type.Integer({ minimum: 1, maximum: 2_147_483_647 });

export const NameSchema = Type.String({ minLength: 1, maxLength: MAX_NAME_LENGTH });

export const PopulationSchema = Type.Integer({ minimum: 0 });

// ─────────────────────────────────────────────────────────────────────────────
// Entity Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const CountryAttributesSchema = Type.Object(
  {
    id: IdSchema,
    iso: Type.String({
      minLength: COUNTRY_ISO_LENGTH,
      maxLength: COUNTRY_ISO_LENGTH,
      pattern: '^[A-Z]+$',
    }),
    callingCode: Type.Integer({ minimum: 0 }),
    name: NameSchema,
    native: NameSchema,
    population: PopulationSchema,
  },
  { additionalProperties: false }
);

export const DivisionAttributesSchema = Type.Object(
  {
    id: IdSchema,
    countryId: ReferenceSchema,
    iso: Type.String({ minLength: 1, maxLength: MAX_DIVISION_ISO_LENGTH }),
    name: NameSchema,
    native: NameSchema,
    population: PopulationSchema,
  },
  { additionalProperties: false }
);

export const UrbanAttributesSchema = Type.Object(
  {
    id: IdSchema,
    divisionId: ReferenceSchema,
    name: NameSchema,
    native: NameSchema,
    iso: Type.String({ minLength: 1, maxLength: MAX_URBAN_ISO_LENGTH }),
  },
  { additionalProperties: false }
);

export type CountryAttributes = Static<typeof CountryAttributesSchema>;
export type DivisionAttributes = Static<typeof DivisionAttributesSchema>;
export type UrbanAttributes = Static<typeof UrbanAttributesSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

const fieldFromPath = (path: string): string => {
  const field = path.replace(/^\//, '').split('/')[0];
  return field === undefined || field === '' ? '(root)' : field;
};

/**
 * Lists every failing constraint, one issue per TypeBox error.
 */
export const collectIssues = (schema: TSchema, value: unknown): AttributeIssue[] =>
  Array.from(Value.Errors(schema, value)).map((error) => ({
    field: fieldFromPath(error.path),
    message: error.message,
    value: error.value,
  }));

/**
 * Checks attributes against a schema without coercing or trimming anything.
 */
export const checkAttributes = <T extends TSchema>(
  schema: T,
  family: EntityFamily,
  kind: string,
  attributes: unknown
): Result<Static<T>, AttributeValidationError> => {
  if (Value.Check(schema, attributes)) {
    return ok(attributes);
  }
  return err(createAttributeValidationError(family, kind, collectIssues(schema, attributes)));
};

/**
 * Domain errors for the geography module.
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { EntityFamily } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Storage error raised by a repository implementation.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A single failed attribute constraint.
 */
export interface AttributeIssue {
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
}

/**
 * One or more attributes broke their constraints at construction.
 */
export interface AttributeValidationError {
  readonly type: 'AttributeValidationError';
  readonly message: string;
  readonly family: EntityFamily;
  readonly kind: string;
  readonly issues: readonly AttributeIssue[];
}

/**
 * Discriminator value that names no variant of the family.
 */
export interface UnknownKindError {
  readonly type: 'UnknownKindError';
  readonly message: string;
  readonly family: EntityFamily;
  readonly kind: string;
}

/**
 * A foreign key that resolves to nothing while seeding.
 */
export interface MissingReferenceError {
  readonly type: 'MissingReferenceError';
  readonly message: string;
  readonly family: EntityFamily;
  readonly id: number;
  readonly field: 'countryId' | 'divisionId';
  readonly reference: number;
}

/**
 * Two entries of one family share an identifier, or an entry has none.
 */
export interface DuplicateIdentifierError {
  readonly type: 'DuplicateIdentifierError';
  readonly message: string;
  readonly family: EntityFamily;
  readonly id: number;
}

export interface TransientEntityError {
  readonly type: 'TransientEntityError';
  readonly message: string;
  readonly family: EntityFamily;
  readonly kind: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type ConstructionError = AttributeValidationError | UnknownKindError;

export type SeedError =
  | ConstructionError
  | MissingReferenceError
  | DuplicateIdentifierError
  | TransientEntityError
  | DatabaseError;

/**
 * All possible geography module errors.
 */
export type GeographyError = ConstructionError | SeedError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createAttributeValidationError = (
  family: EntityFamily,
  kind: string,
  issues: readonly AttributeIssue[]
): AttributeValidationError => ({
  type: 'AttributeValidationError',
  message: `Invalid ${kind}: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`,
  family,
  kind,
  issues,
});

export const createUnknownKindError = (family: EntityFamily, kind: string): UnknownKindError => ({
  type: 'UnknownKindError',
  message: `'${kind}' is not a known ${family} kind`,
  family,
  kind,
});

export const createMissingReferenceError = (
  family: EntityFamily,
  id: number,
  field: 'countryId' | 'divisionId',
  reference: number
): MissingReferenceError => ({
  type: 'MissingReferenceError',
  message: `${family} ${String(id)} references ${field} ${String(reference)} which does not exist`,
  family,
  id,
  field,
  reference,
});

export const createDuplicateIdentifierError = (
  family: EntityFamily,
  id: number
): DuplicateIdentifierError => ({
  type: 'DuplicateIdentifierError',
  message: `Duplicate ${family} id ${String(id)}`,
  family,
  id,
});

export const createTransientEntityError = (
  family: EntityFamily,
  kind: string
): TransientEntityError => ({
  type: 'TransientEntityError',
  message: `Cannot store a transient ${kind}: an identifier is required`,
  family,
  kind,
});

/**
 * Entity identity
 *
 * Identity is the pair (variant, id). An entity whose id still holds the
 * default value of its type is transient: it has no identity yet, so it is
 * never equal to anything, itself included.
 */

import type { Entity, Identifier } from './types.js';

/**
 * True when the identifier holds the default value of its type
 * (`0`, `0n` or the empty string).
 */
export const isDefaultIdentifier = (id: Identifier): boolean => {
  switch (typeof id) {
    case 'bigint':
      return id === 0n;
    case 'string':
      return id === '';
    default:
      return id === 0;
  }
};

/**
 * True when the entity has not been given a durable identifier.
 */
export const isTransient = (entity: Entity<Identifier>): boolean =>
  isDefaultIdentifier(entity.id);

/**
 * Value equality keyed on (family, kind, id).
 *
 * Entities of different variants never compare equal, even when they share
 * a base family and an id (a Province 7 is not a State 7).
 */
export const entityEquals = (
  a: Entity<Identifier> | null | undefined,
  b: Entity<Identifier> | null | undefined
): boolean => {
  if (a == null || b == null) {
    return false;
  }
  if (a.family !== b.family || a.kind !== b.kind) {
    return false;
  }
  if (isTransient(a) || isTransient(b)) {
    return false;
  }
  return a.id === b.id;
};

// ─────────────────────────────────────────────────────────────────────────────
// Hashing
// ─────────────────────────────────────────────────────────────────────────────

const transientHashes = new WeakMap<object, number>();
let nextTransientHash = 1;

const hashString = (value: string): number => {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
};

const hashIdentifier = (id: Identifier): number => {
  if (typeof id === 'bigint') {
    return Number(BigInt.asIntN(32, id));
  }
  if (typeof id === 'number') {
    return Number.isSafeInteger(id) ? id | 0 : hashString(String(id));
  }
  return hashString(id);
};

/**
 * 32-bit hash consistent with `entityEquals`.
 *
 * Persisted entities hash by id. Transient entities get a per-instance
 * sequence number so that distinct unsaved instances stay apart in
 * hash-keyed collections.
 */
export const entityHash = (entity: Entity<Identifier>): number => {
  if (!isTransient(entity)) {
    return hashIdentifier(entity.id);
  }

  const existing = transientHashes.get(entity);
  if (existing !== undefined) {
    return existing;
  }

  const hash = nextTransientHash | 0;
  nextTransientHash++;
  transientHashes.set(entity, hash);
  return hash;
};

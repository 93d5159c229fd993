/**
 * @fileoverview Tombstone - Absent Marker
 *
 * @packageDocumentation
 * @module @typed-context/core/infrastructure/context
 * @license Apache-2.0
 *
 * Contexts have no delete. Hiding a value attaches this marker under the
 * value's key, and lookups that reach the marker first report absence.
 *
 * The marker is not a SealedValue, so no tag can ever open it, and it is
 * distinct from `null`, `undefined` and every zero value a caller might
 * legitimately store.
 */

export class Tombstone {
  toString(): string {
    return 'Tombstone';
  }
}

/**
 * The single marker instance written by `hideValue()` and `hideNamedValue()`.
 */
export const TOMBSTONE: Tombstone = Object.freeze(new Tombstone());

export function isTombstone(value: unknown): value is Tombstone {
  return value === TOMBSTONE;
}

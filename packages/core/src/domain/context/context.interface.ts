/**
 * @fileoverview IContext - Immutable Context Contract
 *
 * @packageDocumentation
 * @module @typed-context/core/domain/context
 * @license Apache-2.0
 *
 * ## Layer: DOMAIN (Core)
 *
 * The contract for the immutable, parent-linked context the value layer is
 * built on. The concrete frames live in the Infrastructure layer.
 *
 * ```
 * Domain Layer (this file)
 *     ↑ depends on nothing external
 *     |
 * Application Layer (typed store/load/hide)
 *     ↑ depends on Domain interfaces
 *     |
 * Infrastructure Layer (ValueContext frames)
 *     ↑ implements Domain interfaces
 * ```
 *
 * @version 1.0.0
 */

/**
 * IContext - a request-scoped, immutable carrier of key/value bindings.
 *
 * @remarks
 * A context is never modified. Attaching a value produces a new child
 * context whose lookups fall back to the parent, so every context handle a
 * caller holds keeps answering the same way forever.
 *
 * Contexts are passed explicitly down a call chain. They are not stored in
 * globals or async-local storage.
 *
 * @example
 * ```typescript
 * function handle(ctx: IContext) {
 *   const [tenant, found] = loadValue(ctx, Tenant);
 *   if (found) {
 *     return repository.forTenant(tenant.id);
 *   }
 * }
 * ```
 */
export interface IContext {
  /**
   * Look up the value bound to `key` in this context or its nearest ancestor.
   *
   * @param key - Key compared by identity (`===`)
   * @returns The bound value, or undefined when no frame binds the key
   */
  value(key: unknown): unknown;

  /**
   * Describe the chain of frames for debugging.
   */
  toString(): string;
}

/**
 * Result of a typed lookup.
 *
 * @template T - Type stored under the tag
 * @template Z - Type of the tag's zero value
 *
 * @remarks
 * Destructure and test `found` to narrow the value:
 *
 * ```typescript
 * const [retries, found] = loadValue(ctx, Retries);
 * if (found) {
 *   retries; // number
 * }
 * ```
 */
export type Lookup<T, Z extends T | undefined = T | undefined> =
  | readonly [value: T, found: true]
  | readonly [value: Z, found: false];

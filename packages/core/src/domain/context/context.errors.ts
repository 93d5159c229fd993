/**
 * @fileoverview Context Errors
 *
 * @packageDocumentation
 * @module @typed-context/core/domain/context
 * @license Apache-2.0
 *
 * ## Layer: DOMAIN
 *
 * Error classes for misuse of the context primitive and for the `require*`
 * accessors. Plain lookups never throw: absence is reported through the
 * `found` flag of a {@link Lookup}.
 *
 * @version 1.0.0
 */

import { type TypeTag } from './type-tag';
import { type ValueKey } from './value-key';

/**
 * Base error class for all context errors.
 *
 * @example
 * ```typescript
 * try {
 *   const tenant = requireValue(ctx, Tenant);
 * } catch (error) {
 *   if (error instanceof ContextError) {
 *     console.error('Context error:', error.message);
 *   }
 * }
 * ```
 */
export abstract class ContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a frame is attached under a `null` or `undefined` key.
 */
export class InvalidContextKeyError extends ContextError {
  public readonly key: null | undefined;

  constructor(key: null | undefined) {
    super(`Invalid context key: ${String(key)}. A context key must be a non-nullish value.`);
    this.key = key;
  }
}

/**
 * Thrown when a frame is attached to a missing parent.
 *
 * @remarks
 * Start chains from `background()` (or `todo()` while the right parent is
 * not yet known) instead of `undefined`.
 */
export class MissingParentContextError extends ContextError {
  constructor() {
    super('Cannot create a context from a missing parent. Use background() or todo() as the root.');
  }
}

/**
 * Thrown by `requireValue()` and `requireNamedValue()` when the slot is
 * empty or hidden.
 */
export class ContextValueNotFoundError extends ContextError {
  /**
   * The key that was looked up.
   */
  public readonly key: ValueKey;

  /**
   * The tag of the requested type.
   */
  public readonly tag: TypeTag<unknown>;

  constructor(key: ValueKey) {
    super(`No value for ${key.toString()} in context. It was never stored or has been hidden.`);
    this.key = key;
    this.tag = key.tag;
  }
}

/**
 * @fileoverview Context Values - Typed Store, Load and Hide
 *
 * @packageDocumentation
 * @module @typed-context/core/application/context
 * @license Apache-2.0
 *
 * ## Layer: APPLICATION
 *
 * Typed access to the values carried by an IContext. The static type of a
 * value is selected with a TypeTag, and an optional name picks one of several
 * independent slots for the same type:
 *
 * ```typescript
 * enum Channel { Red, Blue }
 *
 * let ctx = background();
 * ctx = storeValue(ctx, NumberType, 42);
 * ctx = storeNamedValue(ctx, NumberType, Channel.Red, 11);
 * ctx = storeNamedValue(ctx, StringType, Channel.Red, 'RED');
 *
 * loadValue(ctx, NumberType);                       // [42, true]
 * loadNamedValue(ctx, NumberType, Channel.Red);     // [11, true]
 * loadNamedValue(ctx, StringType, Channel.Red);     // ['RED', true]
 * loadNamedValue(ctx, NumberType, Channel.Blue);    // [0, false]
 *
 * ctx = hideNamedValue(ctx, NumberType, Channel.Red);
 * loadNamedValue(ctx, NumberType, Channel.Red);     // [0, false]
 * ```
 *
 * ## Hiding
 *
 * Contexts have no delete, so hiding attaches a Tombstone under the same key.
 * The nearest binding wins, so the tombstone shadows every earlier value for
 * that key while leaving the older context handles unchanged.
 *
 * Values are stored sealed by their tag. A stored `0`, `''`, `null` or
 * `undefined` is a found value; only the tombstone and a missing binding read
 * as absent.
 *
 * @version 1.0.0
 */

import {
  type IContext,
  type IValueCell,
  type Lookup,
  type Comparable,
  type TypeTag,
  type ValueKey,
  ContextValueNotFoundError,
  synthesizeUnnamed,
  synthesizeNamed,
} from '../../domain/context';
import { TOMBSTONE, isTombstone, withValue } from '../../infrastructure/context';

// ============================================================================
// Unnamed Slots
// ============================================================================

/**
 * Store `value` in the unnamed slot of `tag`.
 *
 * @returns A new context; `ctx` is left untouched
 *
 * @example
 * ```typescript
 * const ctx1 = storeValue(background(), NumberType, 42);
 * loadValue(ctx1, NumberType); // [42, true]
 * ```
 */
export function storeValue<T, Z extends T | undefined>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  value: T,
): IContext {
  return withValue(ctx, synthesizeUnnamed(tag), tag.seal(value));
}

/**
 * Load the value in the unnamed slot of `tag`.
 *
 * @returns `[value, true]`, or `[tag.zero, false]` when nothing is stored,
 * the slot is hidden, or the stored value is not one of this tag's
 */
export function loadValue<T, Z extends T | undefined>(ctx: IContext, tag: TypeTag<T, Z>): Lookup<T, Z> {
  return lookup(ctx, tag, synthesizeUnnamed(tag));
}

/**
 * Hide the unnamed slot of `tag`.
 *
 * @remarks
 * Named slots of the same tag and slots of other tags are not affected.
 */
export function hideValue<T, Z extends T | undefined>(ctx: IContext, tag: TypeTag<T, Z>): IContext {
  return withValue(ctx, synthesizeUnnamed(tag), TOMBSTONE);
}

export function hasValue<T, Z extends T | undefined>(ctx: IContext, tag: TypeTag<T, Z>): boolean {
  return loadValue(ctx, tag)[1];
}

/**
 * Load the value in the unnamed slot of `tag`, or throw.
 *
 * @throws ContextValueNotFoundError if the slot is empty or hidden
 *
 * @remarks
 * Use this where an upstream layer guarantees the value, e.g. in a
 * handler behind middleware that always stores it. Prefer
 * {@link loadValue} everywhere else.
 */
export function requireValue<T, Z extends T | undefined>(ctx: IContext, tag: TypeTag<T, Z>): T {
  return required(ctx, tag, synthesizeUnnamed(tag));
}

// ============================================================================
// Named Slots
// ============================================================================

/**
 * Store `value` in the slot of `tag` named `name`.
 *
 * @example
 * ```typescript
 * let ctx = storeNamedValue(background(), NumberType, 'red', 42);
 * ctx = storeNamedValue(ctx, NumberType, 'blue', 99);
 *
 * loadNamedValue(ctx, NumberType, 'red');  // [42, true]
 * loadNamedValue(ctx, NumberType, 'blue'); // [99, true]
 * ```
 */
export function storeNamedValue<T, Z extends T | undefined, N extends Comparable>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  name: N,
  value: T,
): IContext {
  return withValue(ctx, synthesizeNamed(tag, name), tag.seal(value));
}

export function loadNamedValue<T, Z extends T | undefined, N extends Comparable>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  name: N,
): Lookup<T, Z> {
  return lookup(ctx, tag, synthesizeNamed(tag, name));
}

/**
 * Hide the slot of `tag` named `name`. Other names and the unnamed slot
 * keep their values.
 */
export function hideNamedValue<T, Z extends T | undefined, N extends Comparable>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  name: N,
): IContext {
  return withValue(ctx, synthesizeNamed(tag, name), TOMBSTONE);
}

export function hasNamedValue<T, Z extends T | undefined, N extends Comparable>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  name: N,
): boolean {
  return loadNamedValue(ctx, tag, name)[1];
}

/**
 * @throws ContextValueNotFoundError if the named slot is empty or hidden
 */
export function requireNamedValue<T, Z extends T | undefined, N extends Comparable>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  name: N,
): T {
  return required(ctx, tag, synthesizeNamed(tag, name));
}

// ============================================================================
// Internal
// ============================================================================

function lookup<T, Z extends T | undefined>(ctx: IContext, tag: TypeTag<T, Z>, key: ValueKey): Lookup<T, Z> {
  const cell = resolve(ctx, tag, key);
  if (cell === undefined) {
    return [tag.zero, false];
  }
  return [cell.value, true];
}

function required<T, Z extends T | undefined>(ctx: IContext, tag: TypeTag<T, Z>, key: ValueKey): T {
  const cell = resolve(ctx, tag, key);
  if (cell === undefined) {
    throw new ContextValueNotFoundError(key);
  }
  return cell.value;
}

function resolve<T, Z extends T | undefined>(
  ctx: IContext,
  tag: TypeTag<T, Z>,
  key: ValueKey,
): IValueCell<T> | undefined {
  const stored = ctx.value(key);
  if (stored === undefined || isTombstone(stored)) {
    return undefined;
  }

  const cell = tag.open(stored);
  if (cell === undefined) {
    // Bound under a synthesized key through the raw primitive
    return undefined;
  }

  if (tag.guard !== undefined && !tag.guard(cell.value)) {
    console.warn(
      `Value stored under ${key.toString()} failed the guard of ${tag.toString()}; treating it as absent.`,
    );
    return undefined;
  }

  return cell;
}

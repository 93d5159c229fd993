/**
 * @fileoverview Value Keys - Key Synthesis from (TypeTag, Name)
 *
 * @packageDocumentation
 * @module @typed-context/core/domain/context
 * @license Apache-2.0
 *
 * ## Layer: DOMAIN (Core)
 *
 * Turns a TypeTag, and optionally a name, into the key a context frame is
 * indexed by. Callers never mint keys themselves:
 *
 * ```typescript
 * keysEqual(synthesizeUnnamed(NumberType), synthesizeUnnamed(NumberType));           // true
 * keysEqual(synthesizeNamed(NumberType, 'red'), synthesizeNamed(NumberType, 'red')); // true
 * keysEqual(synthesizeNamed(NumberType, 'red'), synthesizeNamed(StringType, 'red')); // false
 * keysEqual(synthesizeNamed(NumberType, 'red'), synthesizeUnnamed(NumberType));      // false
 * ```
 *
 * Unnamed keys and keys with object names are cached weakly, so they are
 * also `===` to each other. Keys with primitive names are built on every
 * call and never retained; context frames match them with {@link keysEqual}.
 *
 * @version 1.0.0
 */

import { type TypeTag } from './type-tag';

/**
 * @internal
 */
const VALUE_KEY_BRAND = Symbol('ValueKey');

/**
 * Values usable as names. Primitives compare by value (SameValueZero),
 * objects and functions by identity.
 */
export type Comparable = string | number | bigint | boolean | symbol | object | null | undefined;

/**
 * Key for the single unnamed slot of a type.
 */
export class UnnamedKey {
  /** @internal */
  readonly [VALUE_KEY_BRAND]: true = true;

  readonly kind = 'unnamed';

  readonly tag: TypeTag<unknown>;

  /** @internal Use {@link synthesizeUnnamed}. */
  constructor(tag: TypeTag<unknown>) {
    this.tag = tag;
    Object.freeze(this);
  }

  toString(): string {
    return `UnnamedKey(${this.tag.name})`;
  }
}

/**
 * Key for one named slot of a type.
 */
export class NamedKey {
  /** @internal */
  readonly [VALUE_KEY_BRAND]: true = true;

  readonly kind = 'named';

  readonly tag: TypeTag<unknown>;

  readonly name: Comparable;

  /** @internal Use {@link synthesizeNamed}. */
  constructor(tag: TypeTag<unknown>, name: Comparable) {
    this.tag = tag;
    this.name = name;
    Object.freeze(this);
  }

  toString(): string {
    return `NamedKey(${this.tag.name}, ${formatName(this.name)})`;
  }
}

export type ValueKey = UnnamedKey | NamedKey;

const unnamedKeys = new WeakMap<TypeTag<unknown>, UnnamedKey>();

/**
 * Keys with object names, per tag. Both levels are weak, so a key lives
 * only as long as its tag and its name.
 * @internal
 */
const referenceKeys = new WeakMap<TypeTag<unknown>, WeakMap<object, NamedKey>>();

/**
 * Key for the unnamed slot of `tag`.
 *
 * @returns The same key object on every call with the same tag
 */
export function synthesizeUnnamed(tag: TypeTag<unknown>): UnnamedKey {
  let key = unnamedKeys.get(tag);
  if (key === undefined) {
    key = new UnnamedKey(tag);
    unnamedKeys.set(tag, key);
  }
  return key;
}

/**
 * Key for the slot of `tag` named `name`.
 *
 * @remarks
 * Names are matched with SameValueZero, the rule `Map` uses for its keys:
 * `'red'` matches `'red'`, `NaN` matches `NaN`, `0` matches `-0`, and two
 * distinct objects never match even when their contents are equal.
 *
 * Only the runtime value of a name counts. Its TypeScript type is erased,
 * so `Channel.Red` of a numeric enum and the literal `0` give the same key,
 * as do a string enum member and its string. Use symbols or distinct
 * objects as names when two parts of a program need separate name spaces
 * for the same tag.
 *
 * @example
 * ```typescript
 * enum Channel { Red, Blue }
 *
 * const red = synthesizeNamed(NumberType, Channel.Red);
 * keysEqual(red, synthesizeNamed(NumberType, Channel.Red));  // true
 * keysEqual(red, synthesizeNamed(NumberType, 0));            // true
 * keysEqual(red, synthesizeNamed(NumberType, Channel.Blue)); // false
 *
 * const audit = Symbol('audit');
 * keysEqual(synthesizeNamed(NumberType, audit), red);        // false
 * ```
 */
export function synthesizeNamed<N extends Comparable>(tag: TypeTag<unknown>, name: N): NamedKey {
  if (!isReference(name)) {
    return new NamedKey(tag, name);
  }

  let byReference = referenceKeys.get(tag);
  if (byReference === undefined) {
    byReference = new WeakMap();
    referenceKeys.set(tag, byReference);
  }

  let key = byReference.get(name);
  if (key === undefined) {
    key = new NamedKey(tag, name);
    byReference.set(name, key);
  }
  return key;
}

/**
 * Structural key equality: same kind, same tag and, for named keys,
 * SameValueZero-equal names.
 */
export function keysEqual(a: ValueKey, b: ValueKey): boolean {
  if (a.tag !== b.tag) {
    return false;
  }
  if (a.kind === 'unnamed' || b.kind === 'unnamed') {
    return a.kind === b.kind;
  }
  return sameValueZero(a.name, b.name);
}

/**
 * Check if a value is a synthesized key.
 */
export function isValueKey(value: unknown): value is ValueKey {
  return value instanceof UnnamedKey || value instanceof NamedKey;
}

// ============================================================================
// Helpers
// ============================================================================

function isReference(name: Comparable): name is object {
  return (typeof name === 'object' && name !== null) || typeof name === 'function';
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function formatName(name: Comparable): string {
  switch (typeof name) {
    case 'string':
      return JSON.stringify(name);
    case 'bigint':
      return `${name}n`;
    case 'symbol':
      return name.toString();
    case 'object':
    case 'function':
      return name === null ? 'null' : Object.prototype.toString.call(name);
    default:
      return String(name);
  }
}

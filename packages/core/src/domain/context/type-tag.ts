/**
 * @fileoverview TypeTag<T> - Runtime Identity for a Static Type
 *
 * @packageDocumentation
 * @module @typed-context/core/domain/context
 * @license Apache-2.0
 *
 * ## Layer: DOMAIN (Core)
 *
 * TypeScript erases types before the code runs, so "the slot for values of
 * type T" needs a value that stands in for T. A TypeTag is that value: it is
 * minted once (usually as a module-level constant) and its object identity is
 * the identity of the type.
 *
 * ```typescript
 * const Tenant = defineType<ITenant>('Tenant');
 * const Locale = defineType<string>('Locale', { zero: 'en' });
 *
 * // Two tags with the same name are still different types
 * defineType<string>('Locale') === Locale; // false
 * ```
 *
 * Tags also own the sealed containers that values are stored in. A value
 * sealed by one tag can only be opened by that same tag.
 *
 * @version 1.0.0
 */

/**
 * Symbol used as internal brand for type discrimination.
 * @internal
 */
const TYPE_TAG_BRAND = Symbol('TypeTag');

/**
 * Runtime predicate that checks a stored value still has the tag's type.
 */
export type TypeGuard<T> = (value: unknown) => value is T;

/**
 * Options accepted by {@link defineType}.
 */
export interface ITypeTagOptions<T> {
  /**
   * Value reported by lookups that find nothing.
   * When omitted, misses report `undefined`.
   */
  zero?: T;

  /**
   * Checked against every value read back through this tag.
   * A value that fails the guard reads as absent.
   */
  guard?: TypeGuard<T>;

  /** Human-readable description, shown by `toString()`. */
  description?: string;
}

/**
 * Cell holding one stored value. Wrapping the value lets `undefined` and
 * `null` be stored like any other value.
 * @internal
 */
export interface IValueCell<T> {
  readonly value: T;
}

/**
 * Type-erased container for a value stored in a context.
 *
 * @remarks
 * The container itself carries no value. The value lives in a private table
 * of the tag that sealed it, so reading it back requires that exact tag.
 */
export class SealedValue {
  readonly tag: TypeTag<unknown>;

  constructor(tag: TypeTag<unknown>) {
    this.tag = tag;
    Object.freeze(this);
  }

  toString(): string {
    return `SealedValue(${this.tag.name})`;
  }
}

/**
 * TypeTag<T, Z> - identity of the static type T.
 *
 * @template T - The type of value stored under this tag
 * @template Z - The type reported on a miss (`T` with a zero, else `undefined`)
 *
 * @remarks
 * Tags are compared by identity only. There is no registry keyed by name, so
 * unrelated modules that both pick the name `'UserId'` never collide.
 */
export class TypeTag<T, Z extends T | undefined = T | undefined> {
  /** @internal */
  readonly [TYPE_TAG_BRAND]: true = true;

  /** Name used in debugging output. Not part of the identity. */
  readonly name: string;

  readonly description?: string;

  /** Value reported by lookups that miss. */
  readonly zero: Z;

  readonly guard?: TypeGuard<T>;

  /**
   * Phantom type field to carry type information.
   * @internal
   */
  declare readonly _type: T;

  private readonly cells = new WeakMap<SealedValue, IValueCell<T>>();

  constructor(name: string, zero: Z, options?: Omit<ITypeTagOptions<T>, 'zero'>) {
    this.name = name;
    this.zero = zero;
    if (options?.description !== undefined) this.description = options.description;
    if (options?.guard !== undefined) this.guard = options.guard;
    Object.freeze(this);
  }

  /**
   * Seal a value into a container only this tag can open.
   */
  seal(value: T): SealedValue {
    const sealed = new SealedValue(this);
    this.cells.set(sealed, { value });
    return sealed;
  }

  /**
   * Open a container previously produced by {@link TypeTag.seal}.
   *
   * @returns The cell, or undefined when `stored` was not sealed by this tag
   */
  open(stored: unknown): IValueCell<T> | undefined {
    if (!(stored instanceof SealedValue)) {
      return undefined;
    }
    return this.cells.get(stored);
  }

  toString(): string {
    if (this.description !== undefined) {
      return `TypeTag(${this.name}: ${this.description})`;
    }
    return `TypeTag(${this.name})`;
  }

  /**
   * Check if a value is a TypeTag instance.
   */
  static isTypeTag(value: unknown): value is TypeTag<unknown> {
    return (
      typeof value === 'object' &&
      value !== null &&
      TYPE_TAG_BRAND in value &&
      value[TYPE_TAG_BRAND] === true
    );
  }
}

/**
 * Mint a new TypeTag.
 *
 * @param name - Name shown in debugging output
 * @param options - Zero value, guard and description
 *
 * @example
 * ```typescript
 * interface IUser { id: string; roles: string[] }
 *
 * const User = defineType<IUser>('User');
 * const Retries = defineType<number>('Retries', {
 *   zero: 0,
 *   guard: (v): v is number => typeof v === 'number',
 * });
 * ```
 */
export function defineType<T>(name: string, options: ITypeTagOptions<T> & { zero: T }): TypeTag<T, T>;
export function defineType<T>(name: string, options?: ITypeTagOptions<T>): TypeTag<T, undefined>;
export function defineType<T>(name: string, options?: ITypeTagOptions<T>): TypeTag<T> {
  return new TypeTag<T>(name, options?.zero, options);
}

/**
 * Type helper to extract the value type from a TypeTag.
 *
 * @example
 * ```typescript
 * const Retries = defineType<number>('Retries', { zero: 0 });
 * type R = TypeTagValue<typeof Retries>; // number
 * ```
 */
export type TypeTagValue<K> = K extends TypeTag<infer V> ? V : never;

// ============================================================================
// Built-in Tags for the Primitive Types
// ============================================================================

/**
 * Tag for plain `string` values. Misses report `''`.
 */
export const StringType = defineType<string>('string', {
  zero: '',
  guard: (value): value is string => typeof value === 'string',
});

/**
 * Tag for plain `number` values. Misses report `0`.
 */
export const NumberType = defineType<number>('number', {
  zero: 0,
  guard: (value): value is number => typeof value === 'number',
});

/**
 * Tag for plain `boolean` values. Misses report `false`.
 */
export const BooleanType = defineType<boolean>('boolean', {
  zero: false,
  guard: (value): value is boolean => typeof value === 'boolean',
});

export const BigIntType = defineType<bigint>('bigint', {
  zero: 0n,
  guard: (value): value is bigint => typeof value === 'bigint',
});

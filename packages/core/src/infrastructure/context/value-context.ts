/**
 * @fileoverview ValueContext - Immutable Parent-Linked Context Frames
 *
 * @packageDocumentation
 * @module @typed-context/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Layer: INFRASTRUCTURE
 *
 * The concrete IContext. Every `withValue()` call allocates exactly one frame
 * holding one binding and a link to its parent; frames are frozen and never
 * change afterwards. Lookups walk from the queried frame toward the root and
 * stop at the first frame whose key matches.
 *
 * ```
 * background ◄── [Tenant: acme] ◄── [Locale: fr] ◄── [Tenant: Tombstone]
 *                                                            ▲
 *                                             value(Tenant) stops here
 * ```
 *
 * Because frames are never modified, a context can be shared freely between
 * concurrent requests and callbacks. Two `withValue()` calls on the same
 * parent produce two independent siblings.
 *
 * @version 1.0.0
 */

import {
  type IContext,
  InvalidContextKeyError,
  MissingParentContextError,
  isValueKey,
  keysEqual,
} from '../../domain/context';

/**
 * Root context with no bindings.
 *
 * @remarks
 * Use the {@link background} and {@link todo} singletons rather than
 * constructing new roots.
 */
export class EmptyContext implements IContext {
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
    Object.freeze(this);
  }

  value(_key: unknown): undefined {
    return undefined;
  }

  toString(): string {
    return this.label;
  }
}

const backgroundContext = new EmptyContext('context.Background');
const todoContext = new EmptyContext('context.TODO');

/**
 * The root of every context chain: empty, never cancelled, never released.
 */
export function background(): IContext {
  return backgroundContext;
}

/**
 * An empty root for code that does not yet receive a context from its
 * caller. Behaves exactly like {@link background}; only the label differs.
 */
export function todo(): IContext {
  return todoContext;
}

/**
 * A single frame binding one key to one value on top of a parent context.
 *
 * @example
 * ```typescript
 * const ctx = withValue(background(), 'requestId', 'req-1');
 * ctx.value('requestId'); // 'req-1'
 * ctx.value('other');     // undefined
 * ```
 */
export class ValueContext implements IContext {
  readonly parent: IContext;

  readonly key: unknown;

  private readonly bound: unknown;

  /** @internal Use {@link withValue}. */
  constructor(parent: IContext, key: unknown, value: unknown) {
    this.parent = parent;
    this.key = key;
    this.bound = value;
    Object.freeze(this);
  }

  value(key: unknown): unknown {
    let current: IContext = this;
    while (current instanceof ValueContext) {
      if (sameKey(current.key, key)) {
        return current.bound;
      }
      current = current.parent;
    }
    // Root, or a foreign IContext implementation
    return current.value(key);
  }

  toString(): string {
    return `${this.parent.toString()}.WithValue(${describe(this.key)}, ${describe(this.bound)})`;
  }
}

/**
 * Attach `value` under `key` on top of `parent`.
 *
 * @param parent - Context to extend. Left untouched.
 * @param key - Lookup key, compared with `===`, or with `keysEqual` when
 *   both keys are synthesized
 * @param value - Bound value
 * @returns A new child context
 * @throws MissingParentContextError if `parent` is missing
 * @throws InvalidContextKeyError if `key` is null or undefined
 */
export function withValue(parent: IContext, key: unknown, value: unknown): IContext {
  if (parent === null || parent === undefined) {
    throw new MissingParentContextError();
  }
  if (key === null || key === undefined) {
    throw new InvalidContextKeyError(key);
  }
  return new ValueContext(parent, key, value);
}

function sameKey(bound: unknown, requested: unknown): boolean {
  if (bound === requested) {
    return true;
  }
  return isValueKey(bound) && isValueKey(requested) && keysEqual(bound, requested);
}

function describe(value: unknown): string {
  if (value === null || value === undefined) {
    return `<${String(value)}>`;
  }
  try {
    return String(value);
  } catch {
    // Objects without a prototype have no toString
    return Object.prototype.toString.call(value);
  }
}

/**
 * @fileoverview Domain Context Module Exports
 *
 * @packageDocumentation
 * @module @typed-context/core/domain/context
 * @license Apache-2.0
 *
 * ## Layer: DOMAIN
 *
 * Technology-agnostic building blocks of the value layer. The concrete
 * context frames live in the Infrastructure layer.
 *
 * ## What's Exported
 *
 * - **TypeTag<T>**: runtime identity of a static type
 * - **Key synthesis**: UnnamedKey, NamedKey, synthesizeUnnamed, synthesizeNamed
 * - **IContext**: the immutable context contract
 * - **Errors**: ContextError and its subclasses
 */

// ============================================================================
// TypeTag - Type Identity
// ============================================================================

export {
  TypeTag,
  SealedValue,
  defineType,
  type ITypeTagOptions,
  type IValueCell,
  type TypeGuard,
  type TypeTagValue,
  // Built-in tags
  StringType,
  NumberType,
  BooleanType,
  BigIntType,
} from './type-tag';

// ============================================================================
// Key Synthesis
// ============================================================================

export {
  UnnamedKey,
  NamedKey,
  type ValueKey,
  type Comparable,
  synthesizeUnnamed,
  synthesizeNamed,
  keysEqual,
  isValueKey,
} from './value-key';

// ============================================================================
// IContext - Context Interface
// ============================================================================

export { type IContext, type Lookup } from './context.interface';

// ============================================================================
// Errors
// ============================================================================

export {
  ContextError,
  InvalidContextKeyError,
  MissingParentContextError,
  ContextValueNotFoundError,
} from './context.errors';

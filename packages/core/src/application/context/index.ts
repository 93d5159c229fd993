/**
 * @fileoverview Application Context Module Exports
 *
 * @packageDocumentation
 * @module @typed-context/core/application/context
 * @license Apache-2.0
 *
 * ## Layer: APPLICATION
 *
 * ## Usage
 *
 * ```typescript
 * import { background, defineType, storeValue, loadValue } from '@typed-context/core';
 *
 * const Tenant = defineType<{ id: string }>('Tenant');
 * const ctx = storeValue(background(), Tenant, { id: 'acme' });
 * const [tenant, found] = loadValue(ctx, Tenant);
 * ```
 */

// ============================================================================
// Typed Values - Store / Load / Hide
// ============================================================================

export {
  storeValue,
  loadValue,
  hideValue,
  hasValue,
  requireValue,
  storeNamedValue,
  loadNamedValue,
  hideNamedValue,
  hasNamedValue,
  requireNamedValue,
} from './context-values';

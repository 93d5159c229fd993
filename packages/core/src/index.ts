/**
 * @fileoverview @typed-context/core - Main Entry Point
 *
 * Typed, collision-free values on immutable request contexts.
 *
 * @packageDocumentation
 * @module @typed-context/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   background,
 *   defineType,
 *   storeValue,
 *   loadValue,
 *   hideValue,
 * } from '@typed-context/core';
 *
 * interface ITenant { id: string }
 * const Tenant = defineType<ITenant>('Tenant');
 *
 * const ctx = storeValue(background(), Tenant, { id: 'acme' });
 * loadValue(ctx, Tenant);                     // [{ id: 'acme' }, true]
 * loadValue(hideValue(ctx, Tenant), Tenant);  // [undefined, false]
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Type tags, key synthesis, contracts - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Typed store / load / hide
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Immutable context frames
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';

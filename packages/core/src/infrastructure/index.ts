/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer holds the concrete immutable context frames.
 *
 * @module @typed-context/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Context - Immutable frame implementation
// ============================================================================
export * from './context';

/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the technology-agnostic pieces: type tags, key
 * synthesis, the IContext contract and the error classes.
 * NO infrastructure dependencies are allowed here.
 *
 * @module @typed-context/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Context - Type tags, keys and the context contract
// ============================================================================
export * from './context';

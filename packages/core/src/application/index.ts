/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer provides typed store, load and hide operations on
 * top of the immutable context.
 *
 * @module @typed-context/core/application
 * @license Apache-2.0
 */

export * from './context';

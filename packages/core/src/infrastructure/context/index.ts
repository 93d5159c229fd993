/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @typed-context/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Layer: INFRASTRUCTURE
 *
 * - **background() / todo()**: empty root contexts
 * - **withValue()**: attach one binding as a new frame
 * - **ValueContext**: the frame class
 * - **TOMBSTONE**: the absent marker used to hide values
 *
 * ## Usage
 *
 * ```typescript
 * import { background, withValue } from '@typed-context/core';
 *
 * const ctx = withValue(background(), 'requestId', 'req-1');
 * ctx.value('requestId'); // 'req-1'
 * ```
 */

// ============================================================================
// ValueContext - Immutable Frames
// ============================================================================

export { ValueContext, EmptyContext, background, todo, withValue } from './value-context';

// ============================================================================
// Tombstone - Absent Marker
// ============================================================================

export { Tombstone, TOMBSTONE, isTombstone } from './tombstone';

/**
 * @fileoverview Vitest Test Setup
 *
 * Global test configuration for @typed-context/core.
 * This file is loaded before each test file runs.
 *
 * @license Apache-2.0
 */

import { afterEach, vi } from 'vitest';

// ============================================================================
// Per-Test Cleanup
// ============================================================================

afterEach(() => {
  // Restore console spies installed by guard tests
  vi.restoreAllMocks();
});

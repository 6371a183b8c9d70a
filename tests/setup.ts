/**
 * Island Warden — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: Keep fake timers from leaking between files.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

afterEach(() => {
  // A test using vi.useFakeTimers() would otherwise leak into the next one
  vi.clearAllTimers();
  vi.useRealTimers();
});

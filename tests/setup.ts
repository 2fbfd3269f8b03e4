/**
 * Raid Scheduler — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: env.ts exits the process on invalid config, so placeholder credentials must exist
 *      before any test file imports it; schedulers stay off.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// top level, not beforeAll: modules read env at import time
process.env.NODE_ENV = "test";
process.env.DISCORD_TOKEN = "test-token";
process.env.CLIENT_ID = "test-client-id";
process.env.DB_PATH = ":memory:";
process.env.LOG_LEVEL = "silent";
process.env.INTENT_CACHE_SWEEP_DISABLED = "1";
process.env.CHARACTER_SYNC_DISABLED = "1";
delete process.env.SENTRY_DSN;
delete process.env.ANTHROPIC_API_KEY;
delete process.env.LOSTARK_API_KEY;

afterEach(() => {
  // a test that installed fake timers must not leak them into the next one
  vi.clearAllTimers();
  vi.useRealTimers();
});

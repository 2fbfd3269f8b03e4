/**
 * Raid Scheduler — tests/lib/env.test.ts
 * WHAT: Environment schema defaults and aggregated validation errors.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseEnv } from "../../src/lib/env.js";

const REQUIRED = { DISCORD_TOKEN: "test-token", CLIENT_ID: "test-client-id" };

describe("parseEnv", () => {
  it("fills in defaults", () => {
    const env = parseEnv(REQUIRED);

    expect(env.NODE_ENV).toBe("development");
    expect(env.DB_PATH).toBe("data/data.db");
    expect(env.INTENT_TIMEOUT_MS).toBe(20_000);
    expect(env.INTENT_CACHE_HORIZON_DAYS).toBe(30);
    expect(env.SCHEDULE_OVERFLOW).toBe("strict");
    expect(env.HEALTH_PORT).toBe(3002);
    expect(env.RAIDS_CONFIG).toBe("config/raids.yaml");
    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it("coerces numeric strings", () => {
    const env = parseEnv({ ...REQUIRED, HEALTH_PORT: "8080", SENTRY_TRACES_SAMPLE_RATE: "0.5" });

    expect(env.HEALTH_PORT).toBe(8080);
    expect(env.SENTRY_TRACES_SAMPLE_RATE).toBe(0.5);
  });

  it("reports every problem at once", () => {
    expect(() => parseEnv({ CLIENT_ID: "test-client-id", SCHEDULE_OVERFLOW: "loose" })).toThrow(
      /^Environment validation failed:\n- DISCORD_TOKEN: Required\n- SCHEDULE_OVERFLOW: /
    );
  });
});

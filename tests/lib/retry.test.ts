/**
 * Raid Scheduler — tests/lib/retry.test.ts
 * WHAT: withRetry retries recoverable failures only, up to maxAttempts.
 * NOTE: Real timers with 1ms delays; fake timers and rejected promises don't mix well.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

import { withRetry } from "../../src/lib/retry.js";
import { HttpStatusError } from "../../src/lib/errors.js";

const FAST = { initialDelayMs: 1, maxDelayMs: 2 };

/** Fails `failures` times with `error`, then resolves "ok". */
function flaky(failures: number, error: () => Error) {
  let calls = 0;
  const fn = vi.fn(async () => {
    calls += 1;
    if (calls <= failures) throw error();
    return "ok";
  });
  return fn;
}

const unavailable = () => new HttpStatusError("unavailable", 503, "https://api.test");

describe("withRetry", () => {
  it("returns the first success", async () => {
    const fn = flaky(0, unavailable);
    await expect(withRetry(fn, FAST)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries recoverable failures", async () => {
    const fn = flaky(2, unavailable);
    await expect(withRetry(fn, { ...FAST, maxAttempts: 3 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(mockLogger.debug).toHaveBeenCalledTimes(2);
  });

  it("throws the last error once attempts run out", async () => {
    const fn = flaky(5, unavailable);
    await expect(withRetry(fn, { ...FAST, maxAttempts: 2, label: "edit" })).rejects.toBeInstanceOf(HttpStatusError);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(mockLogger.warn.mock.calls[0]?.[0]).toMatchObject({ evt: "retry_exhausted", label: "edit", attempt: 2 });
  });

  it("does not retry errors that are not recoverable", async () => {
    const fn = flaky(1, () => new Error("bug"));
    await expect(withRetry(fn, FAST)).rejects.toThrow("bug");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("lets shouldRetry override the classification", async () => {
    const fn = flaky(1, () => new Error("bug"));
    const shouldRetry = vi.fn(() => true);
    await expect(withRetry(fn, { ...FAST, shouldRetry })).resolves.toBe("ok");
    expect(shouldRetry).toHaveBeenCalledWith(expect.objectContaining({ kind: "unknown" }), 1);
  });

  it("rejects a maxAttempts below one", async () => {
    await expect(withRetry(async () => "x", { maxAttempts: 0 })).rejects.toThrow(
      "withRetry: maxAttempts must be >= 1, got 0"
    );
  });
});

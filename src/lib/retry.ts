/**
 * Raid Scheduler — src/lib/retry.ts
 * WHAT: Retry with exponential backoff for transient failures.
 * WHY: Starter-message edits hit Discord rate limits, the game API returns 5xx under
 *      maintenance, and the LLM API occasionally times out. All of these recover.
 * FLOWS:
 *  - withRetry(fn, options) → retries fn while the classified error is recoverable
 * USAGE:
 *  import { withRetry } from "./retry.js";
 *  const result = await withRetry(() => client.fetchSiblings(name), { label: "lostark_siblings" });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "./logger.js";
import { classifyError, isRecoverable, type ClassifiedError } from "./errors.js";

/**
 * Defaults (3 attempts, 200ms initial, 2x backoff) cost about 600ms worst case,
 * which fits inside a thread command's "처리 중" window.
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms before first retry (default: 200) */
  initialDelayMs?: number;
  /** Maximum delay in ms (default: 5000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (err: ClassifiedError, attempt: number) => boolean;
  /** Label for logging */
  label?: string;
}

/**
 * Run fn, retrying recoverable failures. Throws the last error once attempts
 * run out or shouldRetry says no.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 200,
    maxDelayMs = 5000,
    backoffMultiplier = 2,
    shouldRetry = (err) => isRecoverable(err),
    label = "operation",
  } = options;

  if (maxAttempts < 1) {
    throw new Error(`withRetry: maxAttempts must be >= 1, got ${maxAttempts}`);
  }

  let delayMs = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const classified = classifyError(err);

      if (attempt >= maxAttempts || !shouldRetry(classified, attempt)) {
        logger.warn(
          {
            evt: "retry_exhausted",
            label,
            attempt,
            maxAttempts,
            errorKind: classified.kind,
            errorMessage: classified.message,
          },
          `[retry] ${label} failed after ${attempt} attempts`
        );
        throw err;
      }

      // 0.5x..1.5x jitter so concurrent threads don't retry in lockstep
      const jitteredDelayMs = Math.floor(delayMs * (0.5 + Math.random()));

      logger.debug(
        {
          evt: "retry_attempt",
          label,
          attempt,
          maxAttempts,
          delayMs: jitteredDelayMs,
          errorKind: classified.kind,
        },
        `[retry] ${label} attempt ${attempt} failed, retrying in ${jitteredDelayMs}ms`
      );

      await sleep(jitteredDelayMs);
      delayMs = Math.min(delayMs * backoffMultiplier, maxDelayMs);
    }
  }
}

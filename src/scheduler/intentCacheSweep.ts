/**
 * Raid Scheduler — src/scheduler/intentCacheSweep.ts
 * WHAT: Periodic sweep of intent cache entries older than the horizon.
 * WHY: The file cache only grows otherwise; one file per distinct command.
 * FLOWS:
 *  - every 6h → cache.sweep(horizon) → log stats → recordSchedulerRun
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { DEFAULT_CACHE_HORIZON_MS, type IntentCache } from "../features/raid/intentCache.js";
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";

export const SWEEP_INTERVAL_MS = 6 * 60 * 60 * 1000;
const SCHEDULER_NAME = "intentCacheSweep";

let activeInterval: NodeJS.Timeout | null = null;

/** One sweep. Never throws; failures are logged and counted. */
export async function runIntentCacheSweep(cache: IntentCache, horizonMs: number): Promise<void> {
  try {
    const stats = await cache.sweep(horizonMs);
    recordSchedulerRun(SCHEDULER_NAME, true);
    logger.info({ evt: "intent_cache_sweep", ...stats }, "[intentCache:scheduler] sweep complete");
  } catch (err) {
    recordSchedulerRun(SCHEDULER_NAME, false);
    logger.error({ evt: "intent_cache_sweep_failed", err }, "[intentCache:scheduler] sweep failed");
  }
}

export function startIntentCacheSweep(
  cache: IntentCache,
  horizonMs: number = DEFAULT_CACHE_HORIZON_MS,
  intervalMs: number = SWEEP_INTERVAL_MS
): void {
  if (process.env.INTENT_CACHE_SWEEP_DISABLED === "1") {
    logger.debug("[intentCache:scheduler] disabled via env flag");
    return;
  }
  stopIntentCacheSweep();
  logger.info({ intervalMs, horizonMs }, "[intentCache:scheduler] starting");

  // first sweep right away: a bot that restarts often would otherwise never sweep
  void runIntentCacheSweep(cache, horizonMs);
  const interval = setInterval(() => {
    void runIntentCacheSweep(cache, horizonMs);
  }, intervalMs);
  // don't hold the process open on shutdown
  interval.unref();
  activeInterval = interval;
}

export function stopIntentCacheSweep(): void {
  if (activeInterval) {
    clearInterval(activeInterval);
    activeInterval = null;
    logger.info("[intentCache:scheduler] stopped");
  }
}

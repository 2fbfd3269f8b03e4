/**
 * Raid Scheduler — src/lib/schedulerHealth.ts
 * WHAT: Last-run bookkeeping for background jobs (intent cache sweep, character sync).
 * WHY: /health should say when a job has been failing, not just that the process is up.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  name: string;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  consecutiveFailures: number;
  totalRuns: number;
}

/** consecutive failures before the warning turns into an error log */
const FAILURE_ALERT_THRESHOLD = 3;

const schedulers = new Map<string, SchedulerHealth>();

export function recordSchedulerRun(name: string, success: boolean, now: number = Date.now()): void {
  const health = schedulers.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
  };
  health.lastRunAt = now;
  health.totalRuns += 1;
  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.consecutiveFailures += 1;
    if (health.consecutiveFailures >= FAILURE_ALERT_THRESHOLD) {
      logger.error(
        { evt: "scheduler_failing", scheduler: name, consecutiveFailures: health.consecutiveFailures },
        `[scheduler] ${name} has failed ${health.consecutiveFailures} times in a row`
      );
    }
  }
  schedulers.set(name, health);
}

/** Snapshot; callers can't mutate the live entries. */
export function getSchedulerHealth(): SchedulerHealth[] {
  return [...schedulers.values()].map((h) => ({ ...h }));
}

/** Test helper. */
export function _clearAllSchedulerHealth(): void {
  schedulers.clear();
}

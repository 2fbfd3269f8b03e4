/**
 * Raid Scheduler — src/scheduler/characterSyncScheduler.ts
 * WHAT: Re-sync roster characters from the Lost Ark API every 30 minutes.
 * WHY: Item levels move daily; raid threads should list what members can run today.
 * FLOWS:
 *  - every 30m → syncer.run() → log summary → announce level-ups → recordSchedulerRun
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { CharacterSyncer } from "../features/lostark/characterSync.js";
import type { LevelUp } from "../store/memberCharacterStore.js";
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";

const CHARACTER_SYNC_INTERVAL_MS = 30 * 60 * 1000;
const SCHEDULER_NAME = "characterSync";

export type LevelUpAnnouncer = (levelUps: readonly LevelUp[]) => Promise<void>;

let activeInterval: NodeJS.Timeout | null = null;

/** One sync. Never throws; a failed announcement does not fail the run. */
export async function runCharacterSync(syncer: Pick<CharacterSyncer, "run">, announce?: LevelUpAnnouncer): Promise<void> {
  try {
    const { levelUps, ...stats } = await syncer.run();
    recordSchedulerRun(SCHEDULER_NAME, true);
    logger.info({ evt: "character_sync", ...stats, levelUps: levelUps.length }, "[characterSync:scheduler] sync complete");
    if (announce && levelUps.length > 0) {
      try {
        await announce(levelUps);
      } catch (err) {
        logger.warn({ evt: "character_sync_announce_failed", err }, "[characterSync:scheduler] level-up post failed");
      }
    }
  } catch (err) {
    recordSchedulerRun(SCHEDULER_NAME, false);
    logger.error({ evt: "character_sync_failed", err }, "[characterSync:scheduler] sync failed");
  }
}

export function startCharacterSync(
  syncer: Pick<CharacterSyncer, "run">,
  announce?: LevelUpAnnouncer,
  intervalMs: number = CHARACTER_SYNC_INTERVAL_MS
): void {
  if (process.env.CHARACTER_SYNC_DISABLED === "1") {
    logger.debug("[characterSync:scheduler] disabled via env flag");
    return;
  }
  stopCharacterSync();
  logger.info({ intervalMs }, "[characterSync:scheduler] starting");

  void runCharacterSync(syncer, announce);
  const interval = setInterval(() => {
    void runCharacterSync(syncer, announce);
  }, intervalMs);
  interval.unref();
  activeInterval = interval;
}

export function stopCharacterSync(): void {
  if (activeInterval) {
    clearInterval(activeInterval);
    activeInterval = null;
    logger.info("[characterSync:scheduler] stopped");
  }
}

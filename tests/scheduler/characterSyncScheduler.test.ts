/**
 * Raid Scheduler — tests/scheduler/characterSyncScheduler.test.ts
 * WHAT: Character sync runs never throw, land in scheduler health and announce level-ups.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const loggerMock = vi.hoisted(() => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

vi.mock("../../src/lib/logger.js", () => ({ logger: loggerMock }));

import {
  runCharacterSync,
  startCharacterSync,
  stopCharacterSync,
} from "../../src/scheduler/characterSyncScheduler.js";
import type { SyncSummary } from "../../src/features/lostark/characterSync.js";
import type { LevelUp } from "../../src/store/memberCharacterStore.js";
import { _clearAllSchedulerHealth, getSchedulerHealth } from "../../src/lib/schedulerHealth.js";

const LEVEL_UP: LevelUp = {
  memberId: "10002",
  memberName: "Bob",
  character: "밥본캐",
  className: "버서커",
  oldLevel: "1,630.00",
  newLevel: "1,632.50",
  difference: 2.5,
};

function summary(levelUps: LevelUp[] = []): SyncSummary {
  return { members: 2, synced: 2, skipped: 0, failed: 0, characters: 5, levelUps };
}

function stubSyncer(result: SyncSummary = summary()) {
  return { run: vi.fn(async (): Promise<SyncSummary> => result) };
}

describe("characterSyncScheduler", () => {
  beforeEach(() => {
    _clearAllSchedulerHealth();
  });

  afterEach(() => {
    stopCharacterSync();
  });

  it("logs the summary and announces level-ups", async () => {
    const announce = vi.fn(async (_levelUps: readonly LevelUp[]) => undefined);

    await runCharacterSync(stubSyncer(summary([LEVEL_UP])), announce);

    expect(loggerMock.info).toHaveBeenCalledWith(
      { evt: "character_sync", members: 2, synced: 2, skipped: 0, failed: 0, characters: 5, levelUps: 1 },
      "[characterSync:scheduler] sync complete"
    );
    expect(announce).toHaveBeenCalledWith([LEVEL_UP]);
    expect(getSchedulerHealth()[0]).toMatchObject({ name: "characterSync", consecutiveFailures: 0, totalRuns: 1 });
  });

  it("stays quiet without level-ups and survives a failed announcement", async () => {
    const quiet = vi.fn(async (_levelUps: readonly LevelUp[]) => undefined);
    await runCharacterSync(stubSyncer(), quiet);
    expect(quiet).not.toHaveBeenCalled();

    const broken = vi.fn(async (_levelUps: readonly LevelUp[]): Promise<void> => {
      throw new Error("missing access");
    });
    await expect(runCharacterSync(stubSyncer(summary([LEVEL_UP])), broken)).resolves.toBeUndefined();
    expect(loggerMock.warn.mock.calls[0]?.[0]).toMatchObject({ evt: "character_sync_announce_failed" });
    expect(getSchedulerHealth()[0]).toMatchObject({ consecutiveFailures: 0, totalRuns: 2 });
  });

  it("records a failure instead of throwing", async () => {
    const syncer = {
      run: vi.fn(async (): Promise<SyncSummary> => {
        throw new Error("db locked");
      }),
    };

    await expect(runCharacterSync(syncer)).resolves.toBeUndefined();

    expect(loggerMock.error.mock.calls[0]?.[0]).toMatchObject({ evt: "character_sync_failed" });
    expect(getSchedulerHealth()[0]).toMatchObject({ consecutiveFailures: 1, lastSuccessAt: null });
  });

  it("does nothing while disabled by env", () => {
    const syncer = stubSyncer();

    startCharacterSync(syncer);

    expect(syncer.run).not.toHaveBeenCalled();
  });

  it("syncs on start and every 30 minutes", async () => {
    vi.stubEnv("CHARACTER_SYNC_DISABLED", "0");
    vi.useFakeTimers();
    try {
      const syncer = stubSyncer();

      startCharacterSync(syncer);
      expect(syncer.run).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
      expect(syncer.run).toHaveBeenCalledTimes(3);

      stopCharacterSync();
      await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
      expect(syncer.run).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
      vi.unstubAllEnvs();
    }
  });
});

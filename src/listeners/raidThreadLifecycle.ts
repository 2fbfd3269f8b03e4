/**
 * Raid Scheduler — src/listeners/raidThreadLifecycle.ts
 * WHAT: threadUpdate/threadDelete listeners that drop a thread's in-memory queue,
 *       and its raid binding once the thread is deleted.
 * WHY: /raid rebalance seeds a queue per thread; once the thread is archived or
 *      gone nothing will read it again.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { AnyThreadChannel } from "discord.js";
import { logger } from "../lib/logger.js";
import { unbindRaidThread } from "../store/raidThreadStore.js";
import type { RaidQueueManager } from "../features/raid/raidQueue.js";

export interface ThreadLifecycleDeps {
  queues: Pick<RaidQueueManager, "delete">;
}

function releaseQueue(deps: ThreadLifecycleDeps, threadId: string, reason: "archived" | "deleted"): void {
  if (deps.queues.delete(threadId)) {
    logger.debug({ evt: "raid_queue_released", threadId, reason }, "[raidThread] queue released");
  }
}

export function createThreadUpdateListener(deps: ThreadLifecycleDeps) {
  return (oldThread: AnyThreadChannel, newThread: AnyThreadChannel): void => {
    if (newThread.archived && !oldThread.archived) releaseQueue(deps, newThread.id, "archived");
  };
}

export function createThreadDeleteListener(deps: ThreadLifecycleDeps) {
  return (thread: AnyThreadChannel): void => {
    releaseQueue(deps, thread.id, "deleted");
    // archived threads can be reopened, so only deletion forgets the binding
    if (unbindRaidThread(thread.id)) {
      logger.info({ evt: "raid_thread_unbound", threadId: thread.id }, "[raidThread] binding removed");
    }
  };
}

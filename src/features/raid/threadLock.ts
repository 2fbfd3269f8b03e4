/**
 * Raid Scheduler — src/features/raid/threadLock.ts
 * WHAT: Per-thread task chain shared by every path that rewrites a starter message.
 * WHY: Thread commands and /raid rebalance both read, mutate and re-render the same
 *      text; two of them in flight for one thread would lose an edit.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

const threadChains = new Map<string, Promise<void>>();

/**
 * Run `task` after every earlier task for `threadId` has settled. Different
 * threads never wait on each other. A failed task does not block the next one.
 */
export function runSerialized(threadId: string, task: () => Promise<void>): Promise<void> {
  const previous = threadChains.get(threadId) ?? Promise.resolve();
  const next = previous.then(task, task);
  const tail = next.catch(() => undefined);
  threadChains.set(threadId, tail);
  void tail.then(() => {
    if (threadChains.get(threadId) === tail) threadChains.delete(threadId);
  });
  return next;
}

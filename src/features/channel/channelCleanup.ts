/**
 * Raid Scheduler — src/features/channel/channelCleanup.ts
 * WHAT: Delete a text channel's threads (active and archived) and then its messages.
 * WHY: Recruitment channels fill up with finished raid threads; /channel reset and clean start them over.
 * FLOWS:
 *  - threads: fetchActive + fetchArchived (paged) → delete one by one; failures are counted
 *  - messages: fetch ≤100 → bulkDelete (< 14 days) → single deletes in small batches (older)
 * DOCS:
 *  - TextChannel.bulkDelete: https://discord.js.org/#/docs/discord.js/main/class/TextChannel?scrollTo=bulkDelete
 *  - GuildTextThreadManager.fetchArchived: https://discord.js.org/#/docs/discord.js/main/class/GuildTextThreadManager?scrollTo=fetchArchived
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { AnyThreadChannel, TextChannel } from "discord.js";
import { logger } from "../../lib/logger.js";

/**
 * bulkDelete takes at most 100 messages and only those younger than 14 days
 * (error 50034 otherwise); older messages go one at a time.
 */
const BULK_DELETE_LIMIT = 100;
export const BULK_DELETE_AGE_LIMIT_MS = 14 * 24 * 60 * 60 * 1000;
/** ~10k messages or archived-thread pages */
const MAX_ITERATIONS = 100;
const INDIVIDUAL_DELETE_BATCH = 5;
const DEFAULT_BATCH_DELAY_MS = 1000;

export interface MessagePurgeOptions {
  /** Infinity deletes everything reachable */
  limit: number;
  /** pause between single-delete batches and fetch rounds */
  delayMs?: number;
  now?: number;
}

export interface MessagePurgeResult {
  deleted: number;
  /** deleted one at a time because they were past the bulk-delete age */
  oldDeleted: number;
}

export interface ThreadPurgeResult {
  deleted: number;
  failed: number;
}

export interface ChannelCleanupResult {
  threads: ThreadPurgeResult;
  messages: MessagePurgeResult;
}

function sleep(ms: number): Promise<void> {
  return ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve();
}

async function collectThreads(channel: TextChannel): Promise<AnyThreadChannel[]> {
  const threads = new Map<string, AnyThreadChannel>();
  const active = await channel.threads.fetchActive();
  for (const thread of active.threads.values()) threads.set(thread.id, thread);

  let before: AnyThreadChannel | undefined;
  for (let page = 0; page < MAX_ITERATIONS; page++) {
    const archived = await channel.threads.fetchArchived({ type: "public", limit: 100, before });
    const batch = [...archived.threads.values()];
    for (const thread of batch) threads.set(thread.id, thread);
    before = batch.at(-1);
    if (!archived.hasMore || !before) break;
  }
  return [...threads.values()];
}

export async function deleteChannelThreads(channel: TextChannel): Promise<ThreadPurgeResult> {
  const threads = await collectThreads(channel);
  const result: ThreadPurgeResult = { deleted: 0, failed: 0 };
  for (const thread of threads) {
    try {
      await thread.delete();
      result.deleted++;
    } catch (err) {
      // already gone, or missing ManageThreads
      result.failed++;
      logger.warn({ err, threadId: thread.id, channelId: channel.id }, "[channelCleanup] failed to delete thread");
    }
  }
  return result;
}

export async function deleteChannelMessages(
  channel: TextChannel,
  options: MessagePurgeOptions
): Promise<MessagePurgeResult> {
  const delayMs = options.delayMs ?? DEFAULT_BATCH_DELAY_MS;
  const bulkCutoff = (options.now ?? Date.now()) - BULK_DELETE_AGE_LIMIT_MS;
  const result: MessagePurgeResult = { deleted: 0, oldDeleted: 0 };

  for (let iteration = 0; iteration < MAX_ITERATIONS && result.deleted < options.limit; iteration++) {
    const messages = await channel.messages.fetch({ limit: Math.min(options.limit - result.deleted, BULK_DELETE_LIMIT) });
    if (messages.size === 0) break;
    const before = result.deleted;

    const recent = messages.filter((m) => m.createdTimestamp > bulkCutoff);
    const old = [...messages.filter((m) => m.createdTimestamp <= bulkCutoff).values()];

    if (recent.size > 0) {
      // filterOld=true drops messages that crossed the age limit since the fetch
      const deleted = await channel.bulkDelete(recent, true);
      result.deleted += deleted.size;
    }

    for (let i = 0; i < old.length && result.deleted < options.limit; i += INDIVIDUAL_DELETE_BATCH) {
      const batch = old.slice(i, i + INDIVIDUAL_DELETE_BATCH);
      await Promise.all(
        batch.map(async (message) => {
          try {
            await message.delete();
            result.deleted++;
            result.oldDeleted++;
          } catch (err) {
            logger.warn({ err, messageId: message.id }, "[channelCleanup] failed to delete old message");
          }
        })
      );
      if (i + INDIVIDUAL_DELETE_BATCH < old.length) await sleep(delayMs);
    }

    // nothing deletable left at the head of the channel
    if (result.deleted === before) break;
    if (result.deleted < options.limit) await sleep(delayMs);
  }
  return result;
}

/** Threads, then messages; a thread outlives its deleted starter message. */
export async function cleanChannel(channel: TextChannel, options: MessagePurgeOptions): Promise<ChannelCleanupResult> {
  const threads = await deleteChannelThreads(channel);
  const messages = await deleteChannelMessages(channel, options);
  logger.info(
    {
      evt: "channel_cleaned",
      channelId: channel.id,
      threadsDeleted: threads.deleted,
      threadsFailed: threads.failed,
      messagesDeleted: messages.deleted,
      oldMessagesDeleted: messages.oldDeleted,
    },
    "[channelCleanup] channel cleaned"
  );
  return { threads, messages };
}

/**
 * Raid Scheduler — src/store/raidThreadStore.ts
 * WHAT: Thread → raid binding (which raid, which starter message, what capacity).
 * WHY: Thread commands need the raid's seat limits and the message to edit;
 *      the schedule itself is never stored here, only in the starter message.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import type { Capacity } from "../features/raid/types.js";

export interface RaidThreadBinding {
  threadId: string;
  guildId: string;
  channelId: string;
  starterMessageId: string;
  raidName: string;
  capacity: Capacity;
  createdBy: string;
  /** unix seconds */
  createdAt: number;
}

type RaidThreadRow = {
  thread_id: string;
  guild_id: string;
  channel_id: string;
  starter_message_id: string;
  raid_name: string;
  support_max: number;
  dealer_max: number;
  created_by: string;
  created_at: number;
};

function fromRow(row: RaidThreadRow): RaidThreadBinding {
  return {
    threadId: row.thread_id,
    guildId: row.guild_id,
    channelId: row.channel_id,
    starterMessageId: row.starter_message_id,
    raidName: row.raid_name,
    capacity: { supportMax: row.support_max, dealerMax: row.dealer_max },
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

/** Upsert: re-running /raid create on the same thread rebinds it. */
export function bindRaidThread(binding: Omit<RaidThreadBinding, "createdAt">): void {
  db.prepare(
    `INSERT INTO raid_thread (thread_id, guild_id, channel_id, starter_message_id, raid_name, support_max, dealer_max, created_by)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(thread_id) DO UPDATE SET
       starter_message_id = excluded.starter_message_id,
       raid_name = excluded.raid_name,
       support_max = excluded.support_max,
       dealer_max = excluded.dealer_max`
  ).run(
    binding.threadId,
    binding.guildId,
    binding.channelId,
    binding.starterMessageId,
    binding.raidName,
    binding.capacity.supportMax,
    binding.capacity.dealerMax,
    binding.createdBy
  );
}

export function getRaidThread(threadId: string): RaidThreadBinding | undefined {
  const row = db
    .prepare<[string], RaidThreadRow>(
      `SELECT thread_id, guild_id, channel_id, starter_message_id, raid_name, support_max, dealer_max, created_by, created_at
       FROM raid_thread WHERE thread_id = ?`
    )
    .get(threadId);
  return row ? fromRow(row) : undefined;
}

export function listRaidThreads(guildId: string, limit = 25): RaidThreadBinding[] {
  return db
    .prepare<[string, number], RaidThreadRow>(
      `SELECT thread_id, guild_id, channel_id, starter_message_id, raid_name, support_max, dealer_max, created_by, created_at
       FROM raid_thread WHERE guild_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`
    )
    .all(guildId, limit)
    .map(fromRow);
}

export function unbindRaidThread(threadId: string): boolean {
  return db.prepare(`DELETE FROM raid_thread WHERE thread_id = ?`).run(threadId).changes > 0;
}

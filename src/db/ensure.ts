/**
 * Raid Scheduler — src/db/ensure.ts
 * WHAT: On-start schema for raid thread bindings, the thread command log and synced member characters.
 * WHY: No migrations tooling; every statement is idempotent and additive.
 * FLOWS:
 *  - CREATE TABLE IF NOT EXISTS → CREATE INDEX IF NOT EXISTS → add columns newer builds expect
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *
 * NOTE: Small, synchronous queries only. better-sqlite3 is sync.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type Database from "better-sqlite3";
import { logger } from "../lib/logger.js";

type ColumnInfo = { name: string };

/** Read PRAGMA table_info and ALTER in a column the table lacks. */
export function addColumnIfMissing(
  handle: Database.Database,
  table: string,
  column: string,
  definition: string
): boolean {
  const cols = handle.prepare<[], ColumnInfo>(`PRAGMA table_info(${table})`).all();
  if (cols.some((c) => c.name === column)) return false;
  handle.prepare(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`).run();
  logger.info({ table, column }, "[ensure] added missing column");
  return true;
}

// raid_thread: which raid a recruitment thread belongs to, and where its starter message lives
export function ensureRaidThreadTable(handle: Database.Database): void {
  handle
    .prepare(
      `
      CREATE TABLE IF NOT EXISTS raid_thread (
        thread_id TEXT PRIMARY KEY,
        guild_id TEXT NOT NULL,
        channel_id TEXT NOT NULL,
        starter_message_id TEXT NOT NULL,
        raid_name TEXT NOT NULL,
        support_max INTEGER NOT NULL DEFAULT 2,
        dealer_max INTEGER NOT NULL DEFAULT 6,
        created_by TEXT NOT NULL,
        created_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `
    )
    .run();
  handle.prepare(`CREATE INDEX IF NOT EXISTS idx_raid_thread_guild ON raid_thread(guild_id, created_at)`).run();
}

// raid_command_log: audit trail for !추가/!제거/!수정, read back by /raid history
export function ensureRaidCommandLogTable(handle: Database.Database): void {
  handle
    .prepare(
      `
      CREATE TABLE IF NOT EXISTS raid_command_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        thread_id TEXT NOT NULL,
        author_id TEXT NOT NULL,
        author_name TEXT NOT NULL,
        command_type TEXT NOT NULL CHECK(command_type IN ('add','remove','edit')),
        command_text TEXT NOT NULL,
        created_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `
    )
    .run();
  // outcome columns arrived after the first release
  addColumnIfMissing(handle, "raid_command_log", "source", "TEXT");
  addColumnIfMissing(handle, "raid_command_log", "change_count", "INTEGER NOT NULL DEFAULT 0");
  addColumnIfMissing(handle, "raid_command_log", "error", "TEXT");
  handle
    .prepare(`CREATE INDEX IF NOT EXISTS idx_raid_command_log_thread ON raid_command_log(thread_id, created_at)`)
    .run();
}

// member_character: last Lost Ark sync of each roster member's account, one row per character
export function ensureMemberCharacterTable(handle: Database.Database): void {
  handle
    .prepare(
      `
      CREATE TABLE IF NOT EXISTS member_character (
        member_id TEXT NOT NULL,
        member_name TEXT NOT NULL,
        character_name TEXT NOT NULL,
        class_name TEXT NOT NULL,
        server_name TEXT NOT NULL,
        item_level_text TEXT NOT NULL,
        item_level REAL NOT NULL,
        updated_at INTEGER NOT NULL DEFAULT (unixepoch()),
        PRIMARY KEY (member_id, character_name)
      )
    `
    )
    .run();
  handle.prepare(`CREATE INDEX IF NOT EXISTS idx_member_character_level ON member_character(item_level)`).run();
}

export function ensureRaidSchema(handle: Database.Database): void {
  ensureRaidThreadTable(handle);
  ensureRaidCommandLogTable(handle);
  ensureMemberCharacterTable(handle);
}

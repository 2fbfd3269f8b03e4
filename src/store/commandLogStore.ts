/**
 * Raid Scheduler — src/store/commandLogStore.ts
 * WHAT: Append-only log of thread commands and their outcome.
 * WHY: "누가 나 뺐어?" is the most common question in a raid thread; /raid history answers it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import type { CommandType } from "../features/raid/types.js";

export interface CommandLogEntry {
  threadId: string;
  authorId: string;
  authorName: string;
  commandType: CommandType;
  commandText: string;
  /** where the intents came from: cache | llm | fallback; null when extraction failed */
  source: string | null;
  changeCount: number;
  error: string | null;
}

export interface CommandLogRecord extends CommandLogEntry {
  id: number;
  /** unix seconds */
  createdAt: number;
}

type CommandLogRow = {
  id: number;
  thread_id: string;
  author_id: string;
  author_name: string;
  command_type: CommandType;
  command_text: string;
  source: string | null;
  change_count: number;
  error: string | null;
  created_at: number;
};

export function logThreadCommand(entry: CommandLogEntry): number {
  const result = db
    .prepare(
      `INSERT INTO raid_command_log (thread_id, author_id, author_name, command_type, command_text, source, change_count, error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      entry.threadId,
      entry.authorId,
      entry.authorName,
      entry.commandType,
      entry.commandText,
      entry.source,
      entry.changeCount,
      entry.error
    );
  return Number(result.lastInsertRowid);
}

/** Newest first. */
export function recentThreadCommands(threadId: string, limit = 10): CommandLogRecord[] {
  return db
    .prepare<[string, number], CommandLogRow>(
      `SELECT id, thread_id, author_id, author_name, command_type, command_text, source, change_count, error, created_at
       FROM raid_command_log WHERE thread_id = ? ORDER BY created_at DESC, id DESC LIMIT ?`
    )
    .all(threadId, limit)
    .map((row) => ({
      id: row.id,
      threadId: row.thread_id,
      authorId: row.author_id,
      authorName: row.author_name,
      commandType: row.command_type,
      commandText: row.command_text,
      source: row.source,
      changeCount: row.change_count,
      error: row.error,
      createdAt: row.created_at,
    }));
}

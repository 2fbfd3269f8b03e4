/**
 * Raid Scheduler — src/db/db.ts
 * WHAT: SQLite connection bootstrap.
 * WHY: Centralizes better-sqlite3 setup, PRAGMAs, and the schema so stores can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → ensureRaidSchema → export
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { ensureRaidSchema } from "./ensure.js";

const DB_BUSY_TIMEOUT_MS = 5000;

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const trace = process.env.DB_TRACE === "1";
  const handle = new Database(dbPath, {
    fileMustExist: false,
    verbose: trace ? (sql: unknown) => logger.debug({ evt: "db_call", sql }, "db call") : undefined,
  });
  // WAL lets the health endpoint read while a command writes
  handle.pragma("journal_mode = WAL");
  handle.pragma("synchronous = NORMAL");
  handle.pragma("foreign_keys = ON");
  handle.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
  ensureRaidSchema(handle);
  return handle;
}

export const db = openDatabase(env.DB_PATH);
logger.info({ dbPath: env.DB_PATH }, "SQLite opened");

/** Never throws; shutdown prefers logs over crashes. */
export function closeDatabase(): void {
  logger.info("Closing database connection...");
  try {
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Error closing database");
  }
}

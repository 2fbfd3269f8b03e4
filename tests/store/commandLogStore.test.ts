/**
 * Raid Scheduler — tests/store/commandLogStore.test.ts
 * WHAT: Thread command audit log, newest first.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { db } from "../../src/db/db.js";
import { logThreadCommand, recentThreadCommands, type CommandLogEntry } from "../../src/store/commandLogStore.js";

const entry: CommandLogEntry = {
  threadId: "thread-1",
  authorId: "10005",
  authorName: "Eve",
  commandType: "add",
  commandText: "!추가 1차 딜러",
  source: "llm",
  changeCount: 1,
  error: null,
};

describe("commandLogStore", () => {
  beforeEach(() => {
    db.prepare(`DELETE FROM raid_command_log`).run();
  });

  it("returns the inserted row id and reads entries back", () => {
    const id = logThreadCommand(entry);

    expect(recentThreadCommands("thread-1")).toEqual([{ ...entry, id, createdAt: expect.any(Number) }]);
  });

  it("keeps failed commands with their error", () => {
    logThreadCommand({ ...entry, commandType: "remove", source: null, changeCount: 0, error: "timeout" });

    expect(recentThreadCommands("thread-1")[0]).toMatchObject({ commandType: "remove", source: null, error: "timeout" });
  });

  it("orders newest first within a thread and honors the limit", () => {
    const first = logThreadCommand(entry);
    const second = logThreadCommand({ ...entry, commandText: "!제거 1차" });
    logThreadCommand({ ...entry, threadId: "thread-2" });

    expect(recentThreadCommands("thread-1").map((r) => r.id)).toEqual([second, first]);
    expect(recentThreadCommands("thread-1", 1)).toHaveLength(1);
  });
});

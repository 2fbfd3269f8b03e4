/**
 * Raid Scheduler — tests/listeners/raidThreadCommand.test.ts
 * WHAT: Thread command flow from message to starter edit, reply and log row.
 * HOW: Stores and logger are mocked; the extractor is a stub returning fixed intents.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const storeMocks = vi.hoisted(() => ({
  logThreadCommand: vi.fn(() => 1),
  getRaidThread: vi.fn((_threadId: string) => undefined),
}));

vi.mock("../../src/store/commandLogStore.js", () => ({ logThreadCommand: storeMocks.logThreadCommand }));
vi.mock("../../src/store/raidThreadStore.js", () => ({ getRaidThread: storeMocks.getRaidThread }));

import {
  formatChangeSummary,
  handleThreadCommand,
  parseThreadCommand,
  type ThreadCommandDeps,
} from "../../src/listeners/raidThreadCommand.js";
import type { ExtractRequest, ExtractResult } from "../../src/features/raid/intentExtractor.js";
import { buildRoster } from "../../src/features/raid/roster.js";
import { ExtractionError } from "../../src/lib/errors.js";
import type { Intent } from "../../src/features/raid/types.js";
import { asMessage, createMockThread, createMockThreadMessage } from "../utils/discordMocks.js";

const STARTER = [
  "# 카멘 노말",
  "",
  "## 1차",
  "- when: 토 21시",
  "- who:",
  "  - 서포터(0/2):",
  "  - 딜러(1/6): Alice",
  "- note:",
].join("\n");

function stubExtractor(result: ExtractResult) {
  return { extract: vi.fn(async (_request: ExtractRequest): Promise<ExtractResult> => result) };
}

function deps(extractor: ThreadCommandDeps["extractor"], roster = buildRoster([])): ThreadCommandDeps {
  return { extractor, roster, overflow: "strict" };
}

const addBob: Intent[] = [{ type: "add_participant", user: { name: "Bob" }, round: 1, role: "dealer" }];

describe("parseThreadCommand", () => {
  it("splits the prefix from the command text", () => {
    expect(parseThreadCommand("  !추가 1차 딜러  ")).toEqual({ commandType: "add", commandText: "1차 딜러" });
    expect(parseThreadCommand("!제거")).toEqual({ commandType: "remove", commandText: "" });
    expect(parseThreadCommand("!수정\n2차 일 20시")).toEqual({ commandType: "edit", commandText: "2차 일 20시" });
  });

  it("ignores other messages", () => {
    expect(parseThreadCommand("!추가했어요")).toBeNull();
    expect(parseThreadCommand("안녕하세요")).toBeNull();
  });
});

describe("formatChangeSummary", () => {
  it("lists each change", () => {
    expect(formatChangeSummary(["a", "b"])).toBe("2개의 변경 사항이 적용되었습니다.\n- a\n- b");
    expect(formatChangeSummary([])).toBe("변경된 내용이 없습니다.");
  });
});

describe("handleThreadCommand", () => {
  it("applies extracted intents to the starter message", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    const message = createMockThreadMessage(thread, "!추가 1차 딜러 Bob");
    const extractor = stubExtractor({ ok: true, intents: addBob, source: "llm" });

    await handleThreadCommand(asMessage(message), deps(extractor));

    expect(extractor.extract).toHaveBeenCalledWith({
      historyText: "Eve: !추가 1차 딜러 Bob",
      scheduleText: STARTER,
      commandType: "add",
      author: { name: "Eve", id: "10005" },
      commandText: "1차 딜러 Bob",
    });

    const edited = thread.starter?.edit.mock.calls[0]?.[0];
    expect(edited?.content.split("\n")).toContain("  - 딜러(2/6): Alice, Bob");

    expect(thread.sent[0]?.content).toBe("명령어를 처리 중입니다...");
    expect(thread.sent[0]?.delete).toHaveBeenCalledTimes(1);
    expect(message.reply).toHaveBeenCalledWith({
      content: "1개의 변경 사항이 적용되었습니다.\n- Bob님이 1차의 딜러로 추가됨",
      allowedMentions: { parse: [] },
    });
    expect(storeMocks.logThreadCommand).toHaveBeenCalledWith({
      threadId: "thread-1",
      authorId: "10005",
      authorName: "Eve",
      commandType: "add",
      commandText: "1차 딜러 Bob",
      source: "llm",
      changeCount: 1,
      error: null,
    });
  });

  it("posts the schedule in the thread when the starter cannot be edited", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    thread.starter?.edit.mockRejectedValue(new Error("gone"));
    const message = createMockThreadMessage(thread, "!추가 Bob 딜");

    await handleThreadCommand(asMessage(message), deps(stubExtractor({ ok: true, intents: addBob, source: "cache" })));

    expect(thread.sent).toHaveLength(2);
    expect(thread.sent[1]?.content.split("\n")).toContain("  - 딜러(2/6): Alice, Bob");
  });

  it("leaves the starter alone when nothing changes", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    const message = createMockThreadMessage(thread, "!제거 Zed");
    const intents: Intent[] = [{ type: "remove_participant", user: { name: "Zed" } }];

    await handleThreadCommand(asMessage(message), deps(stubExtractor({ ok: true, intents, source: "llm" })));

    expect(thread.starter?.edit).not.toHaveBeenCalled();
    expect(message.reply.mock.calls[0]?.[0].content).toBe("변경된 내용이 없습니다.");
  });

  it("reports extraction failures without touching the schedule", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    const message = createMockThreadMessage(thread, "!추가 전부 다");
    const error = new ExtractionError("명령어 분석 시간이 초과되었습니다.", "timeout");

    await handleThreadCommand(asMessage(message), deps(stubExtractor({ ok: false, error })));

    expect(thread.starter?.edit).not.toHaveBeenCalled();
    expect(message.reply.mock.calls[0]?.[0].content).toBe("명령어를 처리할 수 없습니다: 명령어 분석 시간이 초과되었습니다.");
    expect(storeMocks.logThreadCommand).toHaveBeenCalledWith(
      expect.objectContaining({ source: null, changeCount: 0, error: "timeout" })
    );
  });

  it("rejects an invalid intent batch as a whole", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    const message = createMockThreadMessage(thread, "!수정 0차");
    const intents: Intent[] = [...addBob, { type: "update_schedule", round: 0, when: "일" }];

    await handleThreadCommand(asMessage(message), deps(stubExtractor({ ok: true, intents, source: "llm" })));

    expect(thread.starter?.edit).not.toHaveBeenCalled();
    expect(message.reply.mock.calls[0]?.[0].content).toBe(
      "명령어를 처리할 수 없습니다: update_schedule: round must be an integer from 1 to 999, got 0"
    );
    expect(storeMocks.logThreadCommand).toHaveBeenCalledWith(
      expect.objectContaining({ source: "llm", error: "invalid_intent" })
    );
  });

  it("answers when the thread has no starter message", async () => {
    const thread = createMockThread({ starterContent: null });
    const message = createMockThreadMessage(thread, "!추가 1차 딜");
    const extractor = stubExtractor({ ok: true, intents: addBob, source: "llm" });

    await handleThreadCommand(asMessage(message), deps(extractor));

    expect(extractor.extract).not.toHaveBeenCalled();
    expect(message.reply.mock.calls[0]?.[0].content).toBe("스레드의 시작 메시지를 찾을 수 없습니다.");
    expect(storeMocks.logThreadCommand).toHaveBeenCalledWith(expect.objectContaining({ error: "starter_missing" }));
  });

  it("turns away members who are not on the roster", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    const message = createMockThreadMessage(thread, "!추가 1차 딜");
    const extractor = stubExtractor({ ok: true, intents: addBob, source: "llm" });
    const roster = buildRoster([{ name: "Ada", discord_id: "20001", active: true, main_characters: [] }]);

    await handleThreadCommand(asMessage(message), deps(extractor, roster));

    expect(message.reply).toHaveBeenCalledWith({
      content: "등록된 멤버만 일정 명령어를 사용할 수 있습니다.",
      allowedMentions: { parse: [] },
    });
    expect(thread.send).not.toHaveBeenCalled();
  });

  it("ignores bots and plain chat", async () => {
    const thread = createMockThread({ starterContent: STARTER });
    const extractor = stubExtractor({ ok: true, intents: addBob, source: "llm" });
    const fromBot = createMockThreadMessage(thread, "!추가 1차", {
      author: { id: "1", bot: true, displayName: "bot" },
    });
    const chat = createMockThreadMessage(thread, "토요일 가능?");

    await handleThreadCommand(asMessage(fromBot), deps(extractor));
    await handleThreadCommand(asMessage(chat), deps(extractor));

    expect(thread.send).not.toHaveBeenCalled();
    expect(fromBot.reply).not.toHaveBeenCalled();
    expect(chat.reply).not.toHaveBeenCalled();
  });
});

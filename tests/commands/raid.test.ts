/**
 * Raid Scheduler — tests/commands/raid.test.ts
 * WHAT: /raid subcommands against mock interactions and threads.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { ChannelType, type APIEmbed } from "discord.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const storeMocks = vi.hoisted(() => ({
  bindRaidThread: vi.fn(),
  getRaidThread: vi.fn((_threadId: string) => undefined),
  recentThreadCommands: vi.fn((_threadId: string, _limit: number): unknown[] => []),
  logThreadCommand: vi.fn(() => 1),
}));

vi.mock("../../src/store/raidThreadStore.js", () => ({
  bindRaidThread: storeMocks.bindRaidThread,
  getRaidThread: storeMocks.getRaidThread,
}));
vi.mock("../../src/store/commandLogStore.js", () => ({
  recentThreadCommands: storeMocks.recentThreadCommands,
  logThreadCommand: storeMocks.logThreadCommand,
}));

import { buildRaidData, createRaidExecutor, participationSummary, QUEUE_STATE_WARNING } from "../../src/commands/raid/index.js";
import { buildRaidTemplate, type RaidDefinition } from "../../src/features/raid/raidConfig.js";
import { RaidQueueManager } from "../../src/features/raid/raidQueue.js";
import { buildRoster } from "../../src/features/raid/roster.js";
import { parseSchedule } from "../../src/features/raid/scheduleCodec.js";
import type { ExtractRequest, ExtractResult } from "../../src/features/raid/intentExtractor.js";
import { handleThreadCommand } from "../../src/listeners/raidThreadCommand.js";
import type { StoredCharacter } from "../../src/store/memberCharacterStore.js";
import type { CommandContext } from "../../src/lib/cmdWrap.js";
import {
  asInteraction,
  createMockInteraction,
  asMessage,
  createMockThread,
  createMockThreadMessage,
  lastContent,
  type MockInteraction,
  type MockInteractionOptions,
} from "../utils/discordMocks.js";

const KAMEN: RaidDefinition = {
  name: "카멘",
  description: "하드",
  min_level: 1630,
  max_level: null,
  members: 8,
  elapsed_time: 30,
};

const TWO_ROUNDS = "# r\n## 1차\n- 딜러(1/6): Alice\n## 2차\n- 서포터(1/2): Eve\n- 딜러(1/6): alice";

function stored(memberName: string, memberId: string, name: string, className: string, itemLevel: number): StoredCharacter {
  return {
    memberId,
    memberName,
    name,
    className,
    serverName: "루페온",
    itemLevelText: String(itemLevel),
    itemLevel,
    updatedAt: 1000,
  };
}

const CHARACTERS = [stored("Eve", "10005", "이브본캐", "바드", 1640), stored("Bob", "10002", "밥본캐", "버서커", 1635)];

function setup(options: MockInteractionOptions, roster = buildRoster([]), characters: StoredCharacter[] = []) {
  const interaction = createMockInteraction(options);
  const ctx: CommandContext = {
    interaction: asInteraction(interaction),
    step: vi.fn(),
    currentPhase: () => "",
    traceId: "trace-1",
  };
  const execute = createRaidExecutor({ raids: [KAMEN], queues: new RaidQueueManager(), roster, characters: () => characters });
  return { interaction, run: () => execute(ctx) };
}

function firstEmbed(interaction: MockInteraction): APIEmbed | undefined {
  const payload = interaction.reply.mock.calls[0]?.[0];
  const embeds: unknown = typeof payload === "object" && payload !== null ? Reflect.get(payload, "embeds") : undefined;
  const first: unknown = Array.isArray(embeds) ? embeds[0] : undefined;
  return typeof first === "object" && first !== null && "toJSON" in first && typeof first.toJSON === "function"
    ? first.toJSON()
    : undefined;
}

describe("participationSummary", () => {
  it("lists the busiest participants first", () => {
    expect(participationSummary(parseSchedule(TWO_ROUNDS))).toEqual(["Alice: 1차, 2차", "Eve: 2차"]);
  });
});

describe("buildRaidData", () => {
  it("offers configured raids as create choices", () => {
    const json = buildRaidData([KAMEN]).toJSON();
    const create = json.options?.find((o) => o.name === "create");
    expect(JSON.stringify(create)).toContain('"value":"카멘 (하드)"');
  });
});

describe("/raid list", () => {
  it("shows each raid's level window, party size and clear time", async () => {
    const { interaction, run } = setup({ subcommand: "list" });

    await run();

    expect(firstEmbed(interaction)?.fields).toEqual([
      { name: "카멘 (하드)", value: "필요 레벨: 1630 이상\n모집 인원: 8명\n예상 소요 시간: 30분", inline: true },
    ]);
  });
});

function createChannel() {
  const thread = createMockThread({ id: "thread-9" });
  const startThread = vi.fn(async (_options: unknown) => thread);
  const channel = {
    id: "channel-1",
    type: ChannelType.GuildText,
    send: vi.fn(async (_payload: unknown) => ({ id: "msg-9", startThread })),
  };
  return { channel, thread, startThread };
}

describe("/raid create", () => {
  it("posts the template, opens a thread and binds it", async () => {
    const { channel, thread, startThread } = createChannel();
    const { interaction, run } = setup({ subcommand: "create", strings: { name: "카멘 (하드)" }, channel });

    await run();

    expect(channel.send).toHaveBeenCalledWith({ content: buildRaidTemplate(KAMEN), allowedMentions: { parse: [] } });
    expect(startThread).toHaveBeenCalledWith(expect.objectContaining({ name: "카멘 모집 스레드" }));
    expect(storeMocks.bindRaidThread).toHaveBeenCalledWith({
      threadId: "thread-9",
      guildId: "guild-1",
      channelId: "channel-1",
      starterMessageId: "msg-9",
      raidName: "카멘 (하드)",
      capacity: { supportMax: 2, dealerMax: 6 },
      createdBy: "10005",
    });
    expect(thread.sent.map((m) => m.content)).toEqual([
      "캐릭터 정보가 없습니다. `/character sync`로 정보를 수집해주세요.",
    ]);
    expect(lastContent(interaction)).toBe("레이드 모집 스레드를 만들었습니다: <#thread-9>");
  });

  it("lists eligible characters in the new thread", async () => {
    const { channel, thread } = createChannel();
    const { run } = setup({ subcommand: "create", strings: { name: "카멘 (하드)" }, channel }, buildRoster([]), CHARACTERS);

    await run();

    expect(thread.sent).toHaveLength(1);
    expect(thread.sent[0]?.content.split("\n").slice(0, 6)).toEqual([
      "# 카멘 (하드) 참가 가능 멤버",
      "",
      "### Eve (<@10005>)",
      "- 총 1개 캐릭터 (서포터: 1개, 딜러: 0개)",
      "**서포터**:",
      "- 🔹 **이브본캐** (바드, 1640)",
    ]);
    expect(thread.send).toHaveBeenCalledWith(expect.objectContaining({ allowedMentions: { parse: [] } }));
  });

  it("skips the list when asked to", async () => {
    const { channel, thread } = createChannel();
    const { run } = setup(
      { subcommand: "create", strings: { name: "카멘 (하드)" }, booleans: { post_characters: false }, channel },
      buildRoster([]),
      CHARACTERS
    );

    await run();

    expect(thread.send).not.toHaveBeenCalled();
  });

  it("still reports the thread when the list cannot be posted", async () => {
    const { channel, thread } = createChannel();
    thread.send.mockRejectedValue(new Error("Missing Access"));
    const { interaction, run } = setup({ subcommand: "create", strings: { name: "카멘 (하드)" }, channel }, buildRoster([]), CHARACTERS);

    await run();

    expect(lastContent(interaction)).toBe("레이드 모집 스레드를 만들었습니다: <#thread-9>");
  });

  it("rejects an unknown raid", async () => {
    const { interaction, run } = setup({ subcommand: "create", strings: { name: "없는 레이드" } });

    await run();

    expect(lastContent(interaction)).toBe("알 수 없는 레이드입니다: 없는 레이드");
    expect(storeMocks.bindRaidThread).not.toHaveBeenCalled();
  });
});

describe("/raid schedule", () => {
  it("requires a thread", async () => {
    const { interaction, run } = setup({ subcommand: "schedule" });

    await run();

    expect(lastContent(interaction)).toBe("레이드 스레드 안에서만 사용할 수 있습니다.");
  });

  it("shows the blank round of a fresh template", async () => {
    const thread = createMockThread({ starterContent: buildRaidTemplate(KAMEN) });
    const { interaction, run } = setup({ subcommand: "schedule", channel: thread });

    await run();

    expect(lastContent(interaction)).toBe(buildRaidTemplate(KAMEN));
    expect(buildRaidTemplate(KAMEN).split("\n")).toContain("## 1차");
  });

  it("renders the schedule with a participation summary", async () => {
    const thread = createMockThread({ starterContent: TWO_ROUNDS });
    const { interaction, run } = setup({ subcommand: "schedule", channel: thread });

    await run();

    const content = lastContent(interaction);
    expect(typeof content === "string" && content.startsWith("# r\n\n## 1차")).toBe(true);
    expect(typeof content === "string" && content.endsWith("\n\n**참여 현황**\nAlice: 1차, 2차\nEve: 2차")).toBe(true);
  });
});

describe("/raid rebalance", () => {
  it("repacks seats into the fewest rounds and rewrites the starter", async () => {
    const thread = createMockThread({ starterContent: "# r\n## 1차\n- 딜러(1/6): Alice\n## 2차\n- 딜러(1/6): Bob" });
    const { interaction, run } = setup({ subcommand: "rebalance", channel: thread });

    await run();

    const edited = thread.starter?.edit.mock.calls[0]?.[0];
    expect(edited?.content.split("\n")).toContain("  - 딜러(2/6): Alice, Bob");
    expect(edited?.content).not.toContain("## 2차");
    expect(lastContent(interaction)).toBe(`일정을 다시 배치했습니다. (2명 신청, 1개 차수)\n${QUEUE_STATE_WARNING}`);
  });

  it("waits for a thread command in flight before reading the starter", async () => {
    const thread = createMockThread({ starterContent: "# r\n## 1차\n- 딜러(1/6): Alice\n## 2차\n- 딜러(1/6): Bob" });
    const starter = thread.starter;
    if (!starter) throw new Error("starter expected");
    starter.edit.mockImplementation(async (payload: { content: string }) => {
      starter.content = payload.content;
      return undefined;
    });

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const extractor = {
      extract: vi.fn(async (_request: ExtractRequest): Promise<ExtractResult> => {
        await gate;
        return { ok: true, intents: [{ type: "add_participant", user: { name: "Cara" }, round: 2, role: "dealer" }], source: "llm" };
      }),
    };
    const message = createMockThreadMessage(thread, "!추가 2차 딜 Cara");
    const command = handleThreadCommand(asMessage(message), { extractor, roster: buildRoster([]), overflow: "strict" });
    const { interaction, run } = setup({ subcommand: "rebalance", channel: thread });
    const rebalance = run();

    await vi.waitFor(() => expect(extractor.extract).toHaveBeenCalledTimes(1));
    expect(starter.edit).not.toHaveBeenCalled();

    release();
    await Promise.all([command, rebalance]);

    expect(starter.edit).toHaveBeenCalledTimes(2);
    expect(starter.edit.mock.calls[0]?.[0].content.split("\n")).toContain("  - 딜러(2/6): Bob, Cara");
    expect(starter.content.split("\n")).toContain("  - 딜러(3/6): Alice, Bob, Cara");
    expect(starter.content).not.toContain("## 2차");
    expect(lastContent(interaction)).toBe(`일정을 다시 배치했습니다. (3명 신청, 1개 차수)\n${QUEUE_STATE_WARNING}`);
  });

  it("is limited to roster members", async () => {
    const thread = createMockThread({ starterContent: TWO_ROUNDS });
    const roster = buildRoster([{ name: "Ada", discord_id: "20001", active: true, main_characters: [] }]);
    const { interaction, run } = setup({ subcommand: "rebalance", channel: thread }, roster);

    await run();

    expect(lastContent(interaction)).toBe("등록된 멤버만 일정을 재배치할 수 있습니다.");
    expect(thread.starter?.edit).not.toHaveBeenCalled();
  });
});

describe("/raid history", () => {
  it("lists recent commands with their outcome", async () => {
    storeMocks.recentThreadCommands.mockReturnValueOnce([
      { id: 2, authorName: "Eve", commandType: "remove", commandText: "", changeCount: 0, error: "timeout", createdAt: 1700000100 },
      { id: 1, authorName: "Eve", commandType: "add", commandText: "1차 딜", changeCount: 1, error: null, createdAt: 1700000000 },
    ]);
    const thread = createMockThread();
    const { interaction, run } = setup({ subcommand: "history", channel: thread });

    await run();

    expect(storeMocks.recentThreadCommands).toHaveBeenCalledWith("thread-1", 10);
    expect(lastContent(interaction)).toBe(
      "<t:1700000100:R> **Eve** `!제거` → 실패 (timeout)\n<t:1700000000:R> **Eve** `!추가 1차 딜` → 1건 변경"
    );
  });

  it("says so when nothing ran yet", async () => {
    const { interaction, run } = setup({ subcommand: "history", channel: createMockThread() });

    await run();

    expect(lastContent(interaction)).toBe("이 스레드에서 실행된 일정 명령어가 없습니다.");
  });
});

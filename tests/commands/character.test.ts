/**
 * Raid Scheduler — tests/commands/character.test.ts
 * WHAT: /character lookup formatting, sync and show against a stub API client and syncer.
 * HOW: show reads the real in-memory database from tests/setup.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { APIEmbed } from "discord.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  createCharacterExecutor,
  eligibleRaids,
  formatCharacterLine,
  type CharacterCommandDeps,
} from "../../src/commands/character/index.js";
import type { LeveledCharacter, LostArkCharacter } from "../../src/features/lostark/lostArkClient.js";
import type { SyncSummary } from "../../src/features/lostark/characterSync.js";
import type { RaidDefinition } from "../../src/features/raid/raidConfig.js";
import type { CommandContext } from "../../src/lib/cmdWrap.js";
import { db } from "../../src/db/db.js";
import { replaceMemberCharacters } from "../../src/store/memberCharacterStore.js";
import {
  asInteraction,
  createMockInteraction,
  lastContent,
  type MockInteraction,
  type MockInteractionOptions,
} from "../utils/discordMocks.js";

const RAIDS: RaidDefinition[] = [
  { name: "카멘", description: "노말", min_level: 1610, max_level: 1630, members: 8, elapsed_time: null },
  { name: "카멘", description: "하드", min_level: 1630, max_level: null, members: 8, elapsed_time: null },
  { name: "상아탑", description: "하드", min_level: 1620, max_level: null, members: 4, elapsed_time: null },
];

function character(name: string, level: string): LostArkCharacter {
  return { ServerName: "루페온", CharacterName: name, CharacterClassName: "바드", ItemMaxLevel: level };
}

function leveled(name: string, itemLevel: number): LeveledCharacter {
  return { ...character(name, String(itemLevel)), itemLevel };
}

function setup(options: MockInteractionOptions, deps: Partial<CharacterCommandDeps> = {}) {
  const interaction = createMockInteraction({ subcommand: "lookup", ...options });
  const ctx: CommandContext = {
    interaction: asInteraction(interaction),
    step: vi.fn(),
    currentPhase: () => "",
    traceId: "trace-1",
  };
  return { interaction, run: () => createCharacterExecutor({ raids: RAIDS, ...deps })(ctx) };
}

/** Embeds of the most recent reply or editReply. */
function lastEmbeds(interaction: MockInteraction): APIEmbed[] {
  const payload = interaction.editReply.mock.calls.at(-1)?.[0] ?? interaction.reply.mock.calls.at(-1)?.[0];
  const embeds: unknown = typeof payload === "object" && payload !== null ? Reflect.get(payload, "embeds") : undefined;
  return Array.isArray(embeds) ? embeds.map((e: { toJSON(): APIEmbed }) => e.toJSON()) : [];
}

function summary(overrides: Partial<SyncSummary> = {}): SyncSummary {
  return { members: 3, synced: 2, skipped: 1, failed: 0, characters: 5, levelUps: [], ...overrides };
}

function stubSyncer(result: SyncSummary, running = false) {
  return { running, run: vi.fn(async (): Promise<SyncSummary> => result) };
}

describe("eligibleRaids", () => {
  it("uses a half-open level window", () => {
    expect(eligibleRaids(leveled("a", 1629.99), RAIDS)).toEqual(["카멘 (노말)", "상아탑 (하드)"]);
    expect(eligibleRaids(leveled("b", 1630), RAIDS)).toEqual(["카멘 (하드)", "상아탑 (하드)"]);
    expect(eligibleRaids(leveled("c", 1500), RAIDS)).toEqual([]);
  });
});

describe("formatCharacterLine", () => {
  it("adds the raid line only when something is open", () => {
    expect(formatCharacterLine(leveled("이브", 1620), RAIDS)).toBe(
      "`1620` **이브** · 바드 · 루페온\n  ↳ 카멘 (노말), 상아탑 (하드)"
    );
    expect(formatCharacterLine(leveled("이브", 1500), RAIDS)).toBe("`1500` **이브** · 바드 · 루페온");
  });
});

describe("/character lookup", () => {
  it("explains a missing API key", async () => {
    const { interaction, run } = setup({ strings: { name: "이브" } });

    await run();

    expect(lastContent(interaction)).toBe("캐릭터 조회가 설정되지 않았습니다. (LOSTARK_API_KEY)");
  });

  it("reports an unknown character", async () => {
    const fetchSiblings = vi.fn(async (_name: string): Promise<LostArkCharacter[]> => []);
    const { interaction, run } = setup({ strings: { name: " 없음 " } }, { client: { fetchSiblings } });

    await run();

    expect(fetchSiblings).toHaveBeenCalledWith("없음");
    expect(interaction.deferReply).toHaveBeenCalledWith({});
    expect(lastContent(interaction)).toBe("캐릭터를 찾을 수 없습니다: 없음");
  });

  it("lists siblings above the minimum level, highest first", async () => {
    const fetchSiblings = vi.fn(
      async (_name: string): Promise<LostArkCharacter[]> => [
        character("부캐", "1,580.00"),
        character("본캐", "1,640.00"),
        character("신캐", "1,612.50"),
      ]
    );
    const { interaction, run } = setup({ strings: { name: "본캐" }, numbers: { min_level: 1600 } }, { client: { fetchSiblings } });

    await run();

    const payload = interaction.editReply.mock.calls[0]?.[0];
    const embeds: unknown = typeof payload === "object" && payload !== null ? Reflect.get(payload, "embeds") : undefined;
    const embed: APIEmbed | undefined = Array.isArray(embeds) ? embeds[0]?.toJSON() : undefined;
    expect(embed?.title).toBe("본캐의 원정대");
    expect(embed?.footer?.text).toBe("2개 캐릭터");
    expect(embed?.description).toBe(
      [
        "`1,640.00` **본캐** · 바드 · 루페온",
        "  ↳ 카멘 (하드), 상아탑 (하드)",
        "`1,612.50` **신캐** · 바드 · 루페온",
        "  ↳ 카멘 (노말)",
      ].join("\n")
    );
  });

  it("says when no sibling meets the minimum", async () => {
    const fetchSiblings = vi.fn(async (_name: string): Promise<LostArkCharacter[]> => [character("부캐", "1,580.00")]);
    const { interaction, run } = setup({ strings: { name: "부캐" }, numbers: { min_level: 1600 } }, { client: { fetchSiblings } });

    await run();

    expect(lastContent(interaction)).toBe("부캐의 원정대에 1600 이상인 캐릭터가 없습니다.");
  });
});

describe("/character sync", () => {
  it("is limited to server managers", async () => {
    const syncer = stubSyncer(summary());
    const { interaction, run } = setup({ subcommand: "sync" }, { syncer });

    await run();

    expect(syncer.run).not.toHaveBeenCalled();
    expect(lastContent(interaction)).toBe("서버 관리 권한이 있어야 동기화를 실행할 수 있습니다.");
  });

  it("explains a missing API key", async () => {
    const { interaction, run } = setup({ subcommand: "sync", isAdmin: true });

    await run();

    expect(lastContent(interaction)).toBe("캐릭터 조회가 설정되지 않았습니다. (LOSTARK_API_KEY)");
  });

  it("reports the summary with level-up embeds", async () => {
    const levelUp = {
      memberId: "10002",
      memberName: "Bob",
      character: "밥본캐",
      className: "버서커",
      oldLevel: "1,630.00",
      newLevel: "1,632.50",
      difference: 2.5,
    };
    const syncer = stubSyncer(summary({ levelUps: [levelUp] }));
    const { interaction, run } = setup({ subcommand: "sync", isAdmin: true }, { syncer });

    await run();

    expect(syncer.run).toHaveBeenCalledTimes(1);
    expect(lastContent(interaction)).toBe(
      "캐릭터 정보 동기화 완료: 멤버 2/3명, 캐릭터 5개\n- 대표 캐릭터가 없어 건너뜀: 1명\n- 레벨 상승: 1개 캐릭터"
    );
    expect(lastEmbeds(interaction).map((e) => e.title)).toEqual(["Bob의 캐릭터 정보 변경"]);
  });

  it("says when it waited on a sync already running", async () => {
    const syncer = stubSyncer(summary({ skipped: 0, failed: 1 }), true);
    const { interaction, run } = setup({ subcommand: "sync", isAdmin: true }, { syncer });

    await run();

    expect(lastContent(interaction)).toBe(
      "진행 중이던 동기화가 끝났습니다.\n캐릭터 정보 동기화 완료: 멤버 2/3명, 캐릭터 5개\n- 조회 실패: 1명\n- 레벨 변화 없음"
    );
  });
});

describe("/character show", () => {
  beforeEach(() => {
    db.prepare(`DELETE FROM member_character`).run();
  });

  it("points at /character sync when nothing is stored", async () => {
    const { interaction, run } = setup({ subcommand: "show" });

    await run();

    expect(lastContent(interaction)).toBe("저장된 캐릭터 정보가 없습니다. `/character sync`로 정보를 수집해주세요.");
  });

  it("lists synced members", async () => {
    replaceMemberCharacters({ id: "10005", name: "Eve" }, [
      { name: "본캐", className: "바드", serverName: "루페온", itemLevelText: "1,640.00", itemLevel: 1640 },
    ], 1000);
    const { interaction, run } = setup({ subcommand: "show" });

    await run();

    expect(lastEmbeds(interaction)[0]?.description).toBe("- **Eve** (<@10005>): 1개 캐릭터, <t:1000:R> 업데이트");
  });

  it("shows one member's characters", async () => {
    replaceMemberCharacters({ id: "10005", name: "Eve" }, [
      { name: "부캐", className: "버서커", serverName: "루페온", itemLevelText: "1,600.00", itemLevel: 1600 },
      { name: "본캐", className: "바드", serverName: "루페온", itemLevelText: "1,640.00", itemLevel: 1640 },
    ], 1000);
    const { interaction, run } = setup({ subcommand: "show", users: { member: { id: "10005", username: "eve" } } });

    await run();

    const embed = lastEmbeds(interaction)[0];
    expect(embed?.title).toBe("Eve의 캐릭터 정보");
    expect(embed?.description).toBe("마지막 업데이트: <t:1000:f>");
    expect(embed?.fields).toEqual([
      { name: "1. 본캐 (루페온)", value: "클래스: 바드\n아이템 레벨: 1,640.00", inline: true },
      { name: "2. 부캐 (루페온)", value: "클래스: 버서커\n아이템 레벨: 1,600.00", inline: true },
    ]);
  });

  it("says when a member has nothing stored", async () => {
    const { interaction, run } = setup({ subcommand: "show", users: { member: { id: "20001", username: "ada" } } });

    await run();

    expect(lastContent(interaction)).toBe("<@20001>의 캐릭터 정보가 없습니다.");
  });
});

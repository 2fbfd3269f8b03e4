/**
 * Raid Scheduler — tests/commands/channel.test.ts
 * WHAT: /channel reset and clean guards and replies.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import type { APIEmbed } from "discord.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { createChannelExecutor } from "../../src/commands/channel/index.js";
import type { CommandContext } from "../../src/lib/cmdWrap.js";
import {
  asInteraction,
  createMockChildThread,
  createMockInteraction,
  createMockTextChannel,
  lastContent,
  type MockInteraction,
  type MockInteractionOptions,
} from "../utils/discordMocks.js";

function setup(options: MockInteractionOptions) {
  const interaction = createMockInteraction(options);
  const ctx: CommandContext = {
    interaction: asInteraction(interaction),
    step: vi.fn(),
    currentPhase: () => "",
    traceId: "trace-1",
  };
  return { interaction, run: () => createChannelExecutor({ delayMs: 0 })(ctx) };
}

function editedEmbed(interaction: MockInteraction): APIEmbed | undefined {
  const payload = interaction.editReply.mock.calls.at(-1)?.[0];
  const embeds: unknown = typeof payload === "object" && payload !== null ? Reflect.get(payload, "embeds") : undefined;
  return Array.isArray(embeds) ? embeds[0]?.toJSON() : undefined;
}

function populatedChannel() {
  const now = Date.now();
  return createMockTextChannel({
    id: "raids",
    activeThreads: [createMockChildThread("t1")],
    messages: [
      { id: "m1", createdTimestamp: now },
      { id: "m2", createdTimestamp: now },
    ],
  });
}

describe("/channel reset", () => {
  it("does nothing without confirmation", async () => {
    const channel = populatedChannel();
    const { interaction, run } = setup({ subcommand: "reset", booleans: { confirm: false }, channel, isAdmin: true });

    await run();

    expect(lastContent(interaction)).toBe("채널 초기화가 취소되었습니다.");
    expect(channel.threads.fetchActive).not.toHaveBeenCalled();
  });

  it("needs a text channel", async () => {
    const { interaction, run } = setup({ subcommand: "reset", booleans: { confirm: true }, isAdmin: true });

    await run();

    expect(lastContent(interaction)).toBe("일반 텍스트 채널에서만 사용할 수 있습니다.");
  });

  it("needs ManageMessages", async () => {
    const channel = populatedChannel();
    const { interaction, run } = setup({ subcommand: "reset", booleans: { confirm: true }, channel });

    await run();

    expect(lastContent(interaction)).toBe("메시지 관리 권한이 있어야 채널을 정리할 수 있습니다.");
    expect(channel.bulkDelete).not.toHaveBeenCalled();
  });

  it("clears every thread and message in the channel", async () => {
    const channel = populatedChannel();
    const { interaction, run } = setup({ subcommand: "reset", booleans: { confirm: true }, channel, isAdmin: true });

    await run();

    expect(channel.remaining).toEqual([]);
    expect(editedEmbed(interaction)?.description).toBe("<#raids>: 스레드 1개, 메시지 2개를 삭제했습니다.");
  });
});

describe("/channel clean", () => {
  it("deletes up to the limit in the chosen channel", async () => {
    const channel = populatedChannel();
    const { interaction, run } = setup({
      subcommand: "clean",
      channels: { channel },
      integers: { limit: 1 },
      isAdmin: true,
    });

    await run();

    expect(channel.messages.fetch).toHaveBeenCalledWith({ limit: 1 });
    expect(channel.remaining.map((m) => m.id)).toEqual(["m2"]);
    expect(editedEmbed(interaction)?.description).toBe("<#raids>: 스레드 1개, 메시지 1개를 삭제했습니다.");
  });

  it("reports an empty channel", async () => {
    const channel = createMockTextChannel({ id: "empty" });
    const { interaction, run } = setup({ subcommand: "clean", channels: { channel }, isAdmin: true });

    await run();

    expect(editedEmbed(interaction)?.description).toBe("<#empty>: 삭제할 항목이 없습니다.");
  });
});

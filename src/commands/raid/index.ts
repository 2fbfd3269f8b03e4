/**
 * Raid Scheduler — src/commands/raid/index.ts
 * WHAT: /raid subcommand router: list, create, schedule, rebalance, history.
 * WHY: Thread commands edit schedules by text; /raid covers setup and inspection.
 * FLOWS:
 *  - create: template → send → startThread → bindRaidThread → eligible characters into the thread
 *  - rebalance: parse starter → seed queue → generateScheduleMessage → edit starter
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  EmbedBuilder,
  ThreadAutoArchiveDuration,
  type AnyThreadChannel,
  type Message,
} from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import {
  buildRaidTemplate,
  capacityForMembers,
  findRaid,
  levelRange,
  raidLabel,
  threadNameFor,
  type RaidDefinition,
} from "../../features/raid/raidConfig.js";
import type { RaidQueueManager } from "../../features/raid/raidQueue.js";
import { isAllowed, type Roster } from "../../features/raid/roster.js";
import { DEFAULT_CAPACITY } from "../../features/raid/rounds.js";
import { fitToMessageLimit, parseSchedule, renderSchedule } from "../../features/raid/scheduleCodec.js";
import { runSerialized } from "../../features/raid/threadLock.js";
import { displayRef } from "../../features/raid/identity.js";
import { buildEligibleMessages } from "../../features/raid/eligibleCharacters.js";
import type { CommandType, RaidData } from "../../features/raid/types.js";
import { bindRaidThread, getRaidThread } from "../../store/raidThreadStore.js";
import { recentThreadCommands } from "../../store/commandLogStore.js";
import type { StoredCharacter } from "../../store/memberCharacterStore.js";

export { buildRaidData } from "./data.js";

export interface RaidCommandDeps {
  raids: readonly RaidDefinition[];
  queues: RaidQueueManager;
  roster: Roster;
  /** characters from the last Lost Ark sync */
  characters: () => readonly StoredCharacter[];
}

const NO_PINGS = { parse: [] };
const EMBED_COLOR = 0x5865f2;
const HISTORY_LIMIT = 10;

export const QUEUE_STATE_WARNING = "⚠️ 대기열은 메모리에만 보관되므로 봇이 재시작되면 초기화됩니다.";

const COMMAND_PREFIX: Record<CommandType, string> = {
  add: "!추가",
  remove: "!제거",
  edit: "!수정",
};

/** One line per participant: "<@1>: 1차, 3차". */
export function participationSummary(data: RaidData): string[] {
  return [...data.userPreferences.values()]
    .sort((a, b) => b.participation - a.participation)
    .map((pref) => `${displayRef(pref.user)}: ${pref.requestedRounds.map((r) => `${r}차`).join(", ")}`);
}

async function requireRaidThread(ctx: CommandContext): Promise<AnyThreadChannel | null> {
  const channel = ctx.interaction.channel;
  if (!channel || !channel.isThread()) {
    await replyOrEdit(ctx.interaction, { content: "레이드 스레드 안에서만 사용할 수 있습니다." });
    return null;
  }
  return channel;
}

async function fetchStarter(ctx: CommandContext, thread: AnyThreadChannel): Promise<Message | null> {
  const starter = await withStep(ctx, "fetch_starter", () => thread.fetchStarterMessage());
  if (!starter) {
    await replyOrEdit(ctx.interaction, { content: "스레드의 시작 메시지를 찾을 수 없습니다." });
  }
  return starter;
}

async function executeList(ctx: CommandContext, deps: RaidCommandDeps): Promise<void> {
  if (deps.raids.length === 0) {
    await replyOrEdit(ctx.interaction, { content: "등록된 레이드가 없습니다." });
    return;
  }
  const embed = new EmbedBuilder().setTitle("레이드 목록").setColor(EMBED_COLOR);
  for (const raid of deps.raids.slice(0, 25)) {
    const lines = [`필요 레벨: ${levelRange(raid)}`, `모집 인원: ${raid.members}명`];
    if (raid.elapsed_time) lines.push(`예상 소요 시간: ${raid.elapsed_time}분`);
    embed.addFields({ name: raidLabel(raid), value: lines.join("\n"), inline: true });
  }
  await replyOrEdit(ctx.interaction, { embeds: [embed] });
}

async function executeCreate(ctx: CommandContext, deps: RaidCommandDeps): Promise<void> {
  const { interaction } = ctx;
  const query = interaction.options.getString("name", true);
  const raid = findRaid(deps.raids, query);
  if (!raid) {
    await replyOrEdit(interaction, { content: `알 수 없는 레이드입니다: ${query}` });
    return;
  }

  const channel = interaction.channel;
  if (!interaction.inGuild() || !channel || channel.type !== ChannelType.GuildText) {
    await replyOrEdit(interaction, { content: "일반 텍스트 채널에서만 레이드를 만들 수 있습니다." });
    return;
  }

  await ensureDeferred(interaction);
  const starter = await withStep(ctx, "send_template", () =>
    channel.send({ content: buildRaidTemplate(raid), allowedMentions: NO_PINGS })
  );
  const thread = await withStep(ctx, "start_thread", () =>
    starter.startThread({ name: threadNameFor(raid), autoArchiveDuration: ThreadAutoArchiveDuration.OneWeek })
  );
  ctx.step("bind_thread");
  bindRaidThread({
    threadId: thread.id,
    guildId: interaction.guildId,
    channelId: channel.id,
    starterMessageId: starter.id,
    raidName: raidLabel(raid),
    capacity: capacityForMembers(raid.members),
    createdBy: interaction.user.id,
  });

  logger.info(
    { evt: "raid_thread_created", threadId: thread.id, raid: raidLabel(raid), guildId: interaction.guildId },
    "[raid] recruitment thread created"
  );
  if (interaction.options.getBoolean("post_characters") ?? true) {
    ctx.step("post_characters");
    await postEligibleCharacters(thread, raid, deps);
  }
  await replyOrEdit(interaction, { content: `레이드 모집 스레드를 만들었습니다: <#${thread.id}>` });
}

/** Failures are logged; the thread is already usable without the list. */
async function postEligibleCharacters(
  thread: Pick<AnyThreadChannel, "id" | "send">,
  raid: RaidDefinition,
  deps: RaidCommandDeps
): Promise<void> {
  try {
    const messages = buildEligibleMessages(raid, deps.characters(), deps.roster);
    for (const content of messages) {
      await thread.send({ content, allowedMentions: NO_PINGS });
    }
    logger.debug(
      { evt: "raid_characters_posted", threadId: thread.id, messages: messages.length },
      "[raid] eligible characters posted"
    );
  } catch (err) {
    logger.warn(
      { evt: "raid_characters_post_failed", threadId: thread.id, err },
      "[raid] eligible character post failed"
    );
  }
}

async function executeSchedule(ctx: CommandContext): Promise<void> {
  const thread = await requireRaidThread(ctx);
  if (!thread) return;
  const starter = await fetchStarter(ctx, thread);
  if (!starter) return;

  const capacity = getRaidThread(thread.id)?.capacity ?? DEFAULT_CAPACITY;
  // a fresh template's blank round is part of the schedule
  const data = parseSchedule(starter.content, { capacity, keepEmptyRounds: true });
  const summary = participationSummary(data);
  const body = [renderSchedule(data, { keepEmptyRounds: true })];
  if (summary.length > 0) body.push("", "**참여 현황**", ...summary);
  await replyOrEdit(ctx.interaction, { content: fitToMessageLimit(body.join("\n")).text, allowedMentions: NO_PINGS });
}

async function executeRebalance(ctx: CommandContext, deps: RaidCommandDeps): Promise<void> {
  const { interaction } = ctx;
  if (!isAllowed(deps.roster, interaction.user.id)) {
    await replyOrEdit(interaction, { content: "등록된 멤버만 일정을 재배치할 수 있습니다." });
    return;
  }
  const thread = await requireRaidThread(ctx);
  if (!thread) return;
  await ensureDeferred(interaction);
  // queued behind thread commands so a repack never overwrites an edit in flight
  await runSerialized(thread.id, () => rebalanceThread(ctx, deps, thread));
}

async function rebalanceThread(ctx: CommandContext, deps: RaidCommandDeps, thread: AnyThreadChannel): Promise<void> {
  const { interaction } = ctx;
  const starter = await fetchStarter(ctx, thread);
  if (!starter) return;

  const capacity = getRaidThread(thread.id)?.capacity ?? DEFAULT_CAPACITY;
  const data = parseSchedule(starter.content, { capacity, keepEmptyRounds: true });
  ctx.step("repack");
  const queue = deps.queues.seedFromSchedule(thread.id, data);
  const result = queue.generateScheduleMessage({
    capacity,
    header: data.header,
    infoLines: data.infoLines,
    baseRounds: data.rounds,
  });

  await withStep(ctx, "edit_starter", () => starter.edit({ content: result.text, allowedMentions: NO_PINGS }));
  logger.info(
    { evt: "raid_rebalanced", threadId: thread.id, requests: queue.size, rounds: result.rounds.length },
    "[raid] schedule rebalanced"
  );

  const lines = [`일정을 다시 배치했습니다. (${queue.size}명 신청, ${result.rounds.length}개 차수)`];
  if (result.truncated) lines.push("일정이 너무 길어 일부가 잘렸습니다.");
  lines.push(QUEUE_STATE_WARNING);
  await replyOrEdit(interaction, { content: lines.join("\n") });
}

async function executeHistory(ctx: CommandContext): Promise<void> {
  const thread = await requireRaidThread(ctx);
  if (!thread) return;
  const records = await withStep(ctx, "load_history", () => recentThreadCommands(thread.id, HISTORY_LIMIT));
  if (records.length === 0) {
    await replyOrEdit(ctx.interaction, { content: "이 스레드에서 실행된 일정 명령어가 없습니다." });
    return;
  }
  const lines = records.map((r) => {
    const outcome = r.error ? `실패 (${r.error})` : `${r.changeCount}건 변경`;
    const text = r.commandText ? ` ${r.commandText}` : "";
    return `<t:${r.createdAt}:R> **${r.authorName}** \`${COMMAND_PREFIX[r.commandType]}${text}\` → ${outcome}`;
  });
  await replyOrEdit(ctx.interaction, { content: fitToMessageLimit(lines.join("\n")).text, allowedMentions: NO_PINGS });
}

export function createRaidExecutor(deps: RaidCommandDeps) {
  return async function execute(ctx: CommandContext): Promise<void> {
    const sub = ctx.interaction.options.getSubcommand();
    switch (sub) {
      case "list":
        return executeList(ctx, deps);
      case "create":
        return executeCreate(ctx, deps);
      case "schedule":
        return executeSchedule(ctx);
      case "rebalance":
        return executeRebalance(ctx, deps);
      case "history":
        return executeHistory(ctx);
      default:
        await replyOrEdit(ctx.interaction, { content: `알 수 없는 하위 명령어입니다: ${sub}` });
    }
  };
}

/**
 * Raid Scheduler — src/commands/channel/index.ts
 * WHAT: /channel reset (current channel, everything) and /channel clean (another channel, bounded).
 * SECURITY:
 *  - ManageMessages by default member permissions; checked again at run time
 *  - bot needs ManageThreads, ManageMessages and ReadMessageHistory in the target channel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, EmbedBuilder, PermissionFlagsBits, type TextChannel } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { cleanChannel, type ChannelCleanupResult } from "../../features/channel/channelCleanup.js";
import { DEFAULT_CLEAN_LIMIT, MAX_CLEAN_LIMIT } from "./data.js";

export { data } from "./data.js";

export interface ChannelCommandDeps {
  /** pause between delete batches; tests pass 0 */
  delayMs?: number;
}

const REQUIRED_BOT_PERMISSIONS = [
  PermissionFlagsBits.ManageThreads,
  PermissionFlagsBits.ManageMessages,
  PermissionFlagsBits.ReadMessageHistory,
];

function buildCleanupEmbed(channelId: string, result: ChannelCleanupResult): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle("채널 정리 완료")
    .setDescription(
      `<#${channelId}>: 스레드 ${result.threads.deleted}개, 메시지 ${result.messages.deleted}개를 삭제했습니다.`
    )
    .setColor(0x57f287);
  if (result.threads.failed > 0) {
    embed.addFields({ name: "삭제하지 못한 스레드", value: `${result.threads.failed}개` });
  }
  if (result.messages.oldDeleted > 0) {
    embed.addFields({
      name: "참고",
      value: `14일이 지난 메시지 ${result.messages.oldDeleted}개는 하나씩 삭제했습니다.`,
    });
  }
  if (result.threads.deleted === 0 && result.messages.deleted === 0) {
    embed.setDescription(`<#${channelId}>: 삭제할 항목이 없습니다.`).setColor(0xfee75c);
  }
  return embed;
}

async function runCleanup(ctx: CommandContext, deps: ChannelCommandDeps, channel: TextChannel, limit: number) {
  const { interaction } = ctx;
  if (!interaction.memberPermissions?.has(PermissionFlagsBits.ManageMessages)) {
    await replyOrEdit(interaction, { content: "메시지 관리 권한이 있어야 채널을 정리할 수 있습니다." });
    return;
  }
  const me = interaction.guild?.members.me;
  if (me && !channel.permissionsFor(me)?.has(REQUIRED_BOT_PERMISSIONS)) {
    await replyOrEdit(interaction, { content: "봇에게 스레드 관리, 메시지 관리, 기록 보기 권한이 필요합니다." });
    return;
  }

  await ensureDeferred(interaction);
  logger.info(
    { evt: "channel_cleanup_start", userId: interaction.user.id, channelId: channel.id, limit },
    "[channel] cleanup starting"
  );
  const result = await withStep(ctx, "clean_channel", () => cleanChannel(channel, { limit, delayMs: deps.delayMs }));
  await replyOrEdit(interaction, { embeds: [buildCleanupEmbed(channel.id, result)] });
}

async function executeReset(ctx: CommandContext, deps: ChannelCommandDeps): Promise<void> {
  const { interaction } = ctx;
  if (!interaction.options.getBoolean("confirm", true)) {
    await replyOrEdit(interaction, { content: "채널 초기화가 취소되었습니다." });
    return;
  }
  const channel = interaction.channel;
  if (!channel || channel.type !== ChannelType.GuildText) {
    await replyOrEdit(interaction, { content: "일반 텍스트 채널에서만 사용할 수 있습니다." });
    return;
  }
  await runCleanup(ctx, deps, channel, Infinity);
}

async function executeClean(ctx: CommandContext, deps: ChannelCommandDeps): Promise<void> {
  const { interaction } = ctx;
  const channel = interaction.options.getChannel("channel", true, [ChannelType.GuildText]);
  // an uncached guild resolves to raw API data without the channel methods
  if (!("bulkDelete" in channel) || channel.type !== ChannelType.GuildText) {
    await replyOrEdit(interaction, { content: "텍스트 채널을 찾을 수 없습니다." });
    return;
  }
  const limit = Math.min(interaction.options.getInteger("limit") ?? DEFAULT_CLEAN_LIMIT, MAX_CLEAN_LIMIT);
  await runCleanup(ctx, deps, channel, limit);
}

export function createChannelExecutor(deps: ChannelCommandDeps = {}) {
  return async function execute(ctx: CommandContext): Promise<void> {
    const sub = ctx.interaction.options.getSubcommand();
    switch (sub) {
      case "reset":
        return executeReset(ctx, deps);
      case "clean":
        return executeClean(ctx, deps);
      default:
        await replyOrEdit(ctx.interaction, { content: `알 수 없는 하위 명령어입니다: ${sub}` });
    }
  };
}

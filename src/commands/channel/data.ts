/**
 * Raid Scheduler — src/commands/channel/data.ts
 * WHAT: SlashCommandBuilder definition for /channel.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";

export const MAX_CLEAN_LIMIT = 1000;
export const DEFAULT_CLEAN_LIMIT = 100;

export const data = new SlashCommandBuilder()
  .setName("channel")
  .setDescription("레이드 채널 정리")
  .addSubcommand((sc) =>
    sc
      .setName("reset")
      .setDescription("이 채널의 모든 스레드와 메시지를 삭제합니다")
      .addBooleanOption((o) => o.setName("confirm").setDescription("정말 모두 삭제합니다").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("clean")
      .setDescription("지정한 채널의 스레드와 최근 메시지를 삭제합니다")
      .addChannelOption((o) =>
        o.setName("channel").setDescription("정리할 채널").setRequired(true).addChannelTypes(ChannelType.GuildText)
      )
      .addIntegerOption((o) =>
        o
          .setName("limit")
          .setDescription(`삭제할 메시지 수 (기본 ${DEFAULT_CLEAN_LIMIT})`)
          .setRequired(false)
          .setMinValue(1)
          .setMaxValue(MAX_CLEAN_LIMIT)
      )
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageMessages);

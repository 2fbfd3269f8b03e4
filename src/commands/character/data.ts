/**
 * Raid Scheduler — src/commands/character/data.ts
 * WHAT: SlashCommandBuilder definition for /character.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder } from "discord.js";

export const data = new SlashCommandBuilder()
  .setName("character")
  .setDescription("로스트아크 캐릭터 정보")
  .addSubcommand((sc) =>
    sc
      .setName("lookup")
      .setDescription("원정대 캐릭터와 아이템 레벨을 조회합니다")
      .addStringOption((o) => o.setName("name").setDescription("캐릭터 이름").setRequired(true).setMaxLength(32))
      .addNumberOption((o) =>
        o.setName("min_level").setDescription("이 레벨 이상만 표시").setRequired(false).setMinValue(0)
      )
  )
  .addSubcommand((sc) => sc.setName("sync").setDescription("멤버 캐릭터 정보를 지금 동기화합니다 (서버 관리 권한)"))
  .addSubcommand((sc) =>
    sc
      .setName("show")
      .setDescription("동기화된 캐릭터 정보를 보여줍니다")
      .addUserOption((o) => o.setName("member").setDescription("멤버 (비우면 전체 목록)").setRequired(false))
  );

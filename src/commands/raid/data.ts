/**
 * Raid Scheduler — src/commands/raid/data.ts
 * WHAT: SlashCommandBuilder definition for /raid.
 * WHY: Separates command definition from handler implementations.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder } from "discord.js";
import { raidLabel, type RaidDefinition } from "../../features/raid/raidConfig.js";

/** Discord caps string choices at 25. */
const MAX_CHOICES = 25;

/** Choices come from config/raids.yaml, so the builder is made after the config loads. */
export function buildRaidData(raids: readonly RaidDefinition[]) {
  const choices = raids.slice(0, MAX_CHOICES).map((raid) => ({ name: raidLabel(raid), value: raidLabel(raid) }));

  return new SlashCommandBuilder()
    .setName("raid")
    .setDescription("레이드 모집 스레드와 일정을 관리합니다")
    .addSubcommand((sc) => sc.setName("list").setDescription("등록된 레이드 목록을 보여줍니다"))
    .addSubcommand((sc) =>
      sc
        .setName("create")
        .setDescription("이 채널에 레이드 모집 메시지와 스레드를 만듭니다")
        .addStringOption((o) => {
          o.setName("name").setDescription("레이드").setRequired(true);
          return choices.length > 0 ? o.addChoices(...choices) : o;
        })
        .addBooleanOption((o) =>
          o.setName("post_characters").setDescription("참가 가능한 캐릭터 목록을 스레드에 올립니다 (기본: 예)")
        )
    )
    .addSubcommand((sc) => sc.setName("schedule").setDescription("현재 스레드의 일정을 보여줍니다"))
    .addSubcommand((sc) =>
      sc.setName("rebalance").setDescription("참가자를 대기열 순서대로 다시 배치합니다 (현재 스레드)")
    )
    .addSubcommand((sc) => sc.setName("history").setDescription("현재 스레드의 최근 일정 명령어 10개"));
}

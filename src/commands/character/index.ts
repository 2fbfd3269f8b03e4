/**
 * Raid Scheduler — src/commands/character/index.ts
 * WHAT: /character subcommands: lookup (live API), sync (admin, store refresh), show (stored characters).
 * WHY: Deciding who brings which character is half of raid scheduling.
 * FLOWS:
 *  - lookup: fetchSiblings → filterByItemLevel → embed with eligible raids
 *  - sync: ManageGuild check → CharacterSyncer.run (shared with the scheduler) → summary + level-up embeds
 *  - show: listSyncedMembers, or one member's listMemberCharacters
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, PermissionFlagsBits } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import {
  filterByItemLevel,
  type LeveledCharacter,
  type LostArkClient,
} from "../../features/lostark/lostArkClient.js";
import { buildLevelUpEmbeds, type CharacterSyncer, type SyncSummary } from "../../features/lostark/characterSync.js";
import { raidLabel, type RaidDefinition } from "../../features/raid/raidConfig.js";
import { listMemberCharacters, listSyncedMembers } from "../../store/memberCharacterStore.js";

export { data } from "./data.js";

export interface CharacterCommandDeps {
  /** undefined when LOSTARK_API_KEY is not configured */
  client?: Pick<LostArkClient, "fetchSiblings">;
  /** undefined when LOSTARK_API_KEY is not configured */
  syncer?: Pick<CharacterSyncer, "run" | "running">;
  raids: readonly RaidDefinition[];
}

const EMBED_COLOR = 0x57f287;
const SHOW_COLOR = 0x3498db;
const MAX_LINES = 25;
/** Discord caps a message at 10 embeds */
const MAX_EMBEDS = 10;
const NO_PINGS = { parse: [] };

const NOT_CONFIGURED = "캐릭터 조회가 설정되지 않았습니다. (LOSTARK_API_KEY)";

/** Raids whose level window contains the character's item level. */
export function eligibleRaids(character: LeveledCharacter, raids: readonly RaidDefinition[]): string[] {
  const labels = raids
    .filter((r) => character.itemLevel >= r.min_level && (!r.max_level || character.itemLevel < r.max_level))
    .map(raidLabel);
  return [...new Set(labels)];
}

export function formatCharacterLine(character: LeveledCharacter, raids: readonly RaidDefinition[]): string {
  const head = `\`${character.ItemMaxLevel}\` **${character.CharacterName}** · ${character.CharacterClassName} · ${character.ServerName}`;
  const eligible = eligibleRaids(character, raids);
  return eligible.length > 0 ? `${head}\n  ↳ ${eligible.join(", ")}` : head;
}

function formatSyncSummary(summary: SyncSummary): string {
  const lines = [
    `캐릭터 정보 동기화 완료: 멤버 ${summary.synced}/${summary.members}명, 캐릭터 ${summary.characters}개`,
  ];
  if (summary.skipped > 0) lines.push(`- 대표 캐릭터가 없어 건너뜀: ${summary.skipped}명`);
  if (summary.failed > 0) lines.push(`- 조회 실패: ${summary.failed}명`);
  lines.push(
    summary.levelUps.length > 0 ? `- 레벨 상승: ${summary.levelUps.length}개 캐릭터` : "- 레벨 변화 없음"
  );
  return lines.join("\n");
}

async function executeLookup(ctx: CommandContext, deps: CharacterCommandDeps): Promise<void> {
  const { interaction } = ctx;
  const client = deps.client;
  if (!client) {
    await replyOrEdit(interaction, { content: NOT_CONFIGURED });
    return;
  }

  const name = interaction.options.getString("name", true).trim();
  const minLevel = interaction.options.getNumber("min_level") ?? 0;

  await ensureDeferred(interaction, false);
  const siblings = await withStep(ctx, "fetch_siblings", () => client.fetchSiblings(name));
  if (siblings.length === 0) {
    await replyOrEdit(interaction, { content: `캐릭터를 찾을 수 없습니다: ${name}` });
    return;
  }

  const characters = filterByItemLevel(siblings, minLevel);
  if (characters.length === 0) {
    await replyOrEdit(interaction, { content: `${name}의 원정대에 ${minLevel} 이상인 캐릭터가 없습니다.` });
    return;
  }

  const lines = characters.slice(0, MAX_LINES).map((c) => formatCharacterLine(c, deps.raids));
  const embed = new EmbedBuilder()
    .setTitle(`${name}의 원정대`)
    .setColor(EMBED_COLOR)
    .setDescription(lines.join("\n").slice(0, 4096))
    .setFooter({ text: `${characters.length}개 캐릭터` });
  await replyOrEdit(interaction, { embeds: [embed] });
}

async function executeSync(ctx: CommandContext, deps: CharacterCommandDeps): Promise<void> {
  const { interaction } = ctx;
  if (!interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild)) {
    await replyOrEdit(interaction, { content: "서버 관리 권한이 있어야 동기화를 실행할 수 있습니다." });
    return;
  }
  const syncer = deps.syncer;
  if (!syncer) {
    await replyOrEdit(interaction, { content: NOT_CONFIGURED });
    return;
  }

  const joined = syncer.running;
  await ensureDeferred(interaction);
  const summary = await withStep(ctx, "sync_characters", () => syncer.run());
  logger.info(
    { evt: "character_sync_manual", userId: interaction.user.id, joined, synced: summary.synced, failed: summary.failed },
    "[character] manual sync finished"
  );

  const content = joined
    ? `진행 중이던 동기화가 끝났습니다.\n${formatSyncSummary(summary)}`
    : formatSyncSummary(summary);
  await replyOrEdit(interaction, {
    content,
    embeds: buildLevelUpEmbeds(summary.levelUps).slice(0, MAX_EMBEDS),
    allowedMentions: NO_PINGS,
  });
}

async function executeShow(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  const member = interaction.options.getUser("member");

  if (!member) {
    const members = listSyncedMembers();
    if (members.length === 0) {
      await replyOrEdit(interaction, { content: "저장된 캐릭터 정보가 없습니다. `/character sync`로 정보를 수집해주세요." });
      return;
    }
    const lines = members.map(
      (m) => `- **${m.memberName}** (<@${m.memberId}>): ${m.characterCount}개 캐릭터, <t:${m.updatedAt}:R> 업데이트`
    );
    const embed = new EmbedBuilder()
      .setTitle("저장된 멤버 목록")
      .setColor(SHOW_COLOR)
      .setDescription(lines.join("\n").slice(0, 4096))
      .setFooter({ text: "특정 멤버의 정보는 /character show member:<멤버>" });
    await replyOrEdit(interaction, { embeds: [embed] });
    return;
  }

  const characters = listMemberCharacters(member.id);
  const first = characters[0];
  if (!first) {
    await replyOrEdit(interaction, { content: `<@${member.id}>의 캐릭터 정보가 없습니다.`, allowedMentions: NO_PINGS });
    return;
  }
  const embed = new EmbedBuilder()
    .setTitle(`${first.memberName}의 캐릭터 정보`)
    .setColor(SHOW_COLOR)
    .setDescription(`마지막 업데이트: <t:${first.updatedAt}:f>`)
    .addFields(
      characters.slice(0, MAX_LINES).map((c, i) => ({
        name: `${i + 1}. ${c.name} (${c.serverName})`,
        value: `클래스: ${c.className}\n아이템 레벨: ${c.itemLevelText}`,
        inline: true,
      }))
    );
  if (characters.length > MAX_LINES) embed.setFooter({ text: `외 ${characters.length - MAX_LINES}개 캐릭터` });
  await replyOrEdit(interaction, { embeds: [embed] });
}

export function createCharacterExecutor(deps: CharacterCommandDeps) {
  return async function execute(ctx: CommandContext): Promise<void> {
    const sub = ctx.interaction.options.getSubcommand();
    switch (sub) {
      case "lookup":
        return executeLookup(ctx, deps);
      case "sync":
        return executeSync(ctx, deps);
      case "show":
        return executeShow(ctx);
      default:
        await replyOrEdit(ctx.interaction, { content: `알 수 없는 하위 명령어입니다: ${sub}` });
    }
  };
}

/**
 * Raid Scheduler — src/features/lostark/characterSync.ts
 * WHAT: Pull every active roster member's account from the Lost Ark API into memberCharacterStore.
 * WHY: Raid threads list eligible characters from stored data; the API is slow and rate limited.
 * FLOWS:
 *  - for each active member: main_characters in order → fetchSiblings → first non-empty account
 *  - filterByItemLevel(…, 0) drops unparseable levels → replaceMemberCharacters → level-ups
 *  - one member failing is logged and counted; the rest still sync
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { logger } from "../../lib/logger.js";
import { filterByItemLevel, type LostArkCharacter, type LostArkClient } from "./lostArkClient.js";
import type { Roster, RosterMember } from "../raid/roster.js";
import {
  replaceMemberCharacters,
  type LevelUp,
  type SyncedCharacter,
} from "../../store/memberCharacterStore.js";

export interface SyncSummary {
  /** active members considered */
  members: number;
  synced: number;
  /** active members without main_characters */
  skipped: number;
  failed: number;
  characters: number;
  levelUps: LevelUp[];
}

export interface CharacterSyncDeps {
  client: Pick<LostArkClient, "fetchSiblings">;
  roster: Roster;
}

const LEVEL_UP_COLOR = 0xfee75c;
const MAX_EMBED_FIELDS = 25;

function toSynced(characters: readonly LostArkCharacter[]): SyncedCharacter[] {
  return filterByItemLevel(characters, 0).map((c) => ({
    name: c.CharacterName,
    className: c.CharacterClassName,
    serverName: c.ServerName,
    itemLevelText: c.ItemMaxLevel,
    itemLevel: c.itemLevel,
  }));
}

/** Try each main character until one resolves to a non-empty account. */
async function fetchAccount(
  client: CharacterSyncDeps["client"],
  member: RosterMember
): Promise<LostArkCharacter[]> {
  for (const name of member.main_characters) {
    const siblings = await client.fetchSiblings(name);
    if (siblings.length > 0) return siblings;
    logger.debug({ evt: "character_sync_empty", member: member.name, character: name }, "[characterSync] no account");
  }
  return [];
}

export async function syncRosterCharacters(deps: CharacterSyncDeps): Promise<SyncSummary> {
  const summary: SyncSummary = { members: 0, synced: 0, skipped: 0, failed: 0, characters: 0, levelUps: [] };

  for (const member of deps.roster.members) {
    if (!member.active) continue;
    summary.members += 1;
    if (member.main_characters.length === 0) {
      summary.skipped += 1;
      continue;
    }
    try {
      const account = await fetchAccount(deps.client, member);
      if (account.length === 0) {
        // previous rows stay until a main character resolves
        summary.failed += 1;
        logger.warn(
          { evt: "character_sync_not_found", member: member.name, mains: member.main_characters },
          "[characterSync] no main character resolved"
        );
        continue;
      }
      const characters = toSynced(account);
      summary.levelUps.push(...replaceMemberCharacters({ id: member.discord_id, name: member.name }, characters));
      summary.synced += 1;
      summary.characters += characters.length;
    } catch (err) {
      summary.failed += 1;
      logger.warn({ evt: "character_sync_member_failed", member: member.name, err }, "[characterSync] member sync failed");
    }
  }
  return summary;
}

/**
 * Shares one run between the scheduler and /character sync; a second caller
 * while a sync is in flight gets the same promise.
 */
export class CharacterSyncer {
  private inFlight: Promise<SyncSummary> | null = null;

  constructor(private readonly deps: CharacterSyncDeps) {}

  get running(): boolean {
    return this.inFlight !== null;
  }

  run(): Promise<SyncSummary> {
    if (this.inFlight) return this.inFlight;
    const run = syncRosterCharacters(this.deps).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }
}

function formatLevelUp(levelUp: LevelUp): string {
  return `아이템 레벨: ${levelUp.oldLevel} → ${levelUp.newLevel} (+${levelUp.difference.toFixed(2)})`;
}

/** One embed per member, fields capped at Discord's 25. */
export function buildLevelUpEmbeds(levelUps: readonly LevelUp[]): EmbedBuilder[] {
  const byMember = new Map<string, LevelUp[]>();
  for (const levelUp of levelUps) {
    const list = byMember.get(levelUp.memberId) ?? [];
    list.push(levelUp);
    byMember.set(levelUp.memberId, list);
  }
  return [...byMember.entries()].map(([memberId, list]) =>
    new EmbedBuilder()
      .setTitle(`${list[0]?.memberName ?? memberId}의 캐릭터 정보 변경`)
      .setDescription(`<@${memberId}>`)
      .setColor(LEVEL_UP_COLOR)
      .addFields(
        list.slice(0, MAX_EMBED_FIELDS).map((l) => ({
          name: `${l.character} (${l.className})`,
          value: formatLevelUp(l),
          inline: false,
        }))
      )
  );
}

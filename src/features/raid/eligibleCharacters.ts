/**
 * Raid Scheduler — src/features/raid/eligibleCharacters.ts
 * WHAT: Which stored characters fit a raid's item-level window, grouped by member and split into support and dealer.
 * WHY: A new recruitment thread opens with the list of who can come and on what.
 * FLOWS:
 *  - eligibleMembers(characters, raid, roster) → per-member supports/dealers, supports-capable members first
 *  - buildEligibleMessages(raid, members) → header, one block per member, stats → packed under MESSAGE_LIMIT
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classRole } from "../lostark/classRoles.js";
import type { StoredCharacter } from "../../store/memberCharacterStore.js";
import { levelRange, raidLabel, type RaidDefinition } from "./raidConfig.js";
import { isAllowed, type Roster } from "./roster.js";
import { fitToMessageLimit, MESSAGE_LIMIT } from "./scheduleCodec.js";

export interface EligibleMember {
  memberId: string;
  memberName: string;
  supports: StoredCharacter[];
  dealers: StoredCharacter[];
}

export const NO_CHARACTER_DATA = "캐릭터 정보가 없습니다. `/character sync`로 정보를 수집해주세요.";

function fitsRaid(itemLevel: number, raid: RaidDefinition): boolean {
  return itemLevel >= raid.min_level && (!raid.max_level || itemLevel < raid.max_level);
}

function total(member: EligibleMember): number {
  return member.supports.length + member.dealers.length;
}

/** Members with a support character first, then by how many characters fit. */
export function eligibleMembers(
  characters: readonly StoredCharacter[],
  raid: RaidDefinition,
  roster: Roster
): EligibleMember[] {
  const byMember = new Map<string, EligibleMember>();
  for (const character of characters) {
    if (!isAllowed(roster, character.memberId) || !fitsRaid(character.itemLevel, raid)) continue;
    const member = byMember.get(character.memberId) ?? {
      memberId: character.memberId,
      memberName: character.memberName,
      supports: [],
      dealers: [],
    };
    (classRole(character.className) === "support" ? member.supports : member.dealers).push(character);
    byMember.set(character.memberId, member);
  }

  const members = [...byMember.values()];
  for (const member of members) {
    member.supports.sort((a, b) => b.itemLevel - a.itemLevel);
    member.dealers.sort((a, b) => b.itemLevel - a.itemLevel);
  }
  return members.sort((a, b) => {
    const supportFirst = Number(b.supports.length > 0) - Number(a.supports.length > 0);
    return supportFirst !== 0 ? supportFirst : total(b) - total(a);
  });
}

function characterLine(marker: string, c: StoredCharacter): string {
  return `- ${marker} **${c.name}** (${c.className}, ${c.itemLevelText})`;
}

export function formatEligibleMember(member: EligibleMember): string {
  const lines = [
    `### ${member.memberName} (<@${member.memberId}>)`,
    `- 총 ${total(member)}개 캐릭터 (서포터: ${member.supports.length}개, 딜러: ${member.dealers.length}개)`,
  ];
  if (member.supports.length > 0) {
    lines.push("**서포터**:", ...member.supports.map((c) => characterLine("🔹", c)));
  }
  if (member.dealers.length > 0) {
    lines.push("**딜러**:", ...member.dealers.map((c) => characterLine("🔸", c)));
  }
  return lines.join("\n");
}

export function formatEligibleStats(members: readonly EligibleMember[]): string {
  const supports = members.reduce((n, m) => n + m.supports.length, 0);
  const dealers = members.reduce((n, m) => n + m.dealers.length, 0);
  const lines = [
    "## 통계 정보",
    `- 총 참가 가능 멤버: **${members.length}명**`,
    `- 총 캐릭터: **${supports + dealers}개** (서포터: **${supports}개**, 딜러: **${dealers}개**)`,
  ];
  if (supports + dealers > 0) {
    lines.push(`- 서포터 비율: **${((supports / (supports + dealers)) * 100).toFixed(1)}%**`);
  }
  return lines.join("\n");
}

/**
 * Greedy packing of blocks into messages, blank line between blocks. A block
 * over the limit is split on line boundaries.
 */
export function packMessages(blocks: readonly string[], limit: number = MESSAGE_LIMIT): string[] {
  const pieces = blocks.flatMap((block) => (block.length <= limit ? [block] : splitBlock(block, limit)));
  const messages: string[] = [];
  let current = "";
  for (const piece of pieces) {
    if (current && current.length + 2 + piece.length <= limit) {
      current += `\n\n${piece}`;
      continue;
    }
    if (current) messages.push(current);
    current = piece;
  }
  if (current) messages.push(current);
  return messages;
}

function splitBlock(block: string, limit: number): string[] {
  const parts: string[] = [];
  let current = "";
  for (const raw of block.split("\n")) {
    const line = fitToMessageLimit(raw, limit).text;
    if (current && current.length + 1 + line.length > limit) {
      parts.push(current);
      current = line;
    } else {
      current = current ? `${current}\n${line}` : line;
    }
  }
  if (current) parts.push(current);
  return parts;
}

/** Messages to post in a new raid thread. */
export function buildEligibleMessages(
  raid: RaidDefinition,
  characters: readonly StoredCharacter[],
  roster: Roster
): string[] {
  if (characters.length === 0) return [NO_CHARACTER_DATA];
  const members = eligibleMembers(characters, raid, roster);
  if (members.length === 0) {
    return [`**참여 가능한 캐릭터가 없습니다.**\n- 필요 레벨: ${levelRange(raid)}`];
  }
  return packMessages([
    `# ${raidLabel(raid)} 참가 가능 멤버`,
    ...members.map(formatEligibleMember),
    formatEligibleStats(members),
  ]);
}

/**
 * Raid Scheduler — src/store/memberCharacterStore.ts
 * WHAT: Each roster member's characters as of the last Lost Ark sync.
 * WHY: New raid threads list who can join without calling the API per thread;
 *      keeping the previous levels lets a sync report level-ups.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";

export interface MemberRef {
  /** Discord snowflake */
  id: string;
  name: string;
}

export interface SyncedCharacter {
  name: string;
  className: string;
  serverName: string;
  /** as the API reports it, e.g. "1,640.00" */
  itemLevelText: string;
  itemLevel: number;
}

export interface StoredCharacter extends SyncedCharacter {
  memberId: string;
  memberName: string;
  /** unix seconds */
  updatedAt: number;
}

export interface LevelUp {
  memberId: string;
  memberName: string;
  character: string;
  className: string;
  oldLevel: string;
  newLevel: string;
  difference: number;
}

export interface SyncedMember {
  memberId: string;
  memberName: string;
  characterCount: number;
  /** unix seconds */
  updatedAt: number;
}

type MemberCharacterRow = {
  member_id: string;
  member_name: string;
  character_name: string;
  class_name: string;
  server_name: string;
  item_level_text: string;
  item_level: number;
  updated_at: number;
};

const COLUMNS =
  "member_id, member_name, character_name, class_name, server_name, item_level_text, item_level, updated_at";

function fromRow(row: MemberCharacterRow): StoredCharacter {
  return {
    memberId: row.member_id,
    memberName: row.member_name,
    name: row.character_name,
    className: row.class_name,
    serverName: row.server_name,
    itemLevelText: row.item_level_text,
    itemLevel: row.item_level,
    updatedAt: row.updated_at,
  };
}

export function listMemberCharacters(memberId: string): StoredCharacter[] {
  return db
    .prepare<[string], MemberCharacterRow>(
      `SELECT ${COLUMNS} FROM member_character WHERE member_id = ? ORDER BY item_level DESC, character_name`
    )
    .all(memberId)
    .map(fromRow);
}

export function listAllMemberCharacters(): StoredCharacter[] {
  return db
    .prepare<[], MemberCharacterRow>(
      `SELECT ${COLUMNS} FROM member_character ORDER BY member_name, item_level DESC, character_name`
    )
    .all()
    .map(fromRow);
}

export function listSyncedMembers(): SyncedMember[] {
  return db
    .prepare<[], { member_id: string; member_name: string; character_count: number; updated_at: number }>(
      `SELECT member_id, MAX(member_name) AS member_name, COUNT(*) AS character_count, MAX(updated_at) AS updated_at
       FROM member_character GROUP BY member_id ORDER BY member_name`
    )
    .all()
    .map((row) => ({
      memberId: row.member_id,
      memberName: row.member_name,
      characterCount: row.character_count,
      updatedAt: row.updated_at,
    }));
}

/**
 * Swap a member's characters for a fresh sync in one transaction. Returns the
 * characters whose item level went up since the previous sync; characters seen
 * for the first time are not level-ups.
 */
export function replaceMemberCharacters(
  member: MemberRef,
  characters: readonly SyncedCharacter[],
  now: number = Math.floor(Date.now() / 1000)
): LevelUp[] {
  const replace = db.transaction((): LevelUp[] => {
    const previous = new Map(listMemberCharacters(member.id).map((c) => [c.name, c]));
    db.prepare(`DELETE FROM member_character WHERE member_id = ?`).run(member.id);

    const insert = db.prepare(
      `INSERT INTO member_character (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(member_id, character_name) DO NOTHING`
    );
    const levelUps: LevelUp[] = [];
    for (const character of characters) {
      insert.run(
        member.id,
        member.name,
        character.name,
        character.className,
        character.serverName,
        character.itemLevelText,
        character.itemLevel,
        now
      );
      const before = previous.get(character.name);
      if (before && character.itemLevel > before.itemLevel) {
        levelUps.push({
          memberId: member.id,
          memberName: member.name,
          character: character.name,
          className: character.className,
          oldLevel: before.itemLevelText,
          newLevel: character.itemLevelText,
          difference: character.itemLevel - before.itemLevel,
        });
      }
    }
    return levelUps;
  });
  return replace();
}

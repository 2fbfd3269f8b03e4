/**
 * Raid Scheduler — src/features/raid/localParser.ts
 * WHAT: Pattern-based intent extraction for the common command shapes.
 * WHY: Used when no LLM key is configured, so `!추가 1차 딜` still works offline.
 * PATTERNS:
 *  - add/remove:  "1차 딜", "2차 폿", "2딜", "딜", "1차" (remove only), "전부" (remove only)
 *  - edit:        "1차 토 21시", "3차 추가 일 20시", "2차 노트 숙련자"
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { normalizeRole } from "./roles.js";
import type { CommandType, Intent, UserRef } from "./types.js";

export const MAX_INTENTS_PER_COMMAND = 10;

const ROLE_ALT = "서포터|서폿|폿|딜러|딜";
// round+role | count+role | role | round alone
const SEAT_RE = new RegExp(`(?:(\\d+)\\s*차)?\\s*(?:(\\d+)\\s*)?(${ROLE_ALT})|(\\d+)\\s*차`, "g");
const COUNT_RE = new RegExp(`(\\d+)\\s*(?:${ROLE_ALT})`, "g");
const ALL_RE = /전부|전체|모두|\ball\b/i;

const NOTE_RE = /^(\d+)\s*차\s*(?:노트|note|메모)\s*[:：]?\s*(.*)$/i;
const ADD_ROUND_RE = /^(\d+)\s*차\s*(?:추가|생성)\s*[:：]?\s*(.*)$/;
const SCHEDULE_RE = /^(\d+)\s*차\s*[:：]?\s*(.+)$/;

/** Sum of "N딜"/"N폿" counts in the text ("1차 딜" is a round marker, not a count). */
export function countRolePatterns(text: string): number {
  let total = 0;
  for (const match of text.matchAll(COUNT_RE)) {
    total += Number(match[1] ?? 0);
  }
  return total;
}

function parseSeats(commandType: "add" | "remove", text: string, author: UserRef): Intent[] {
  const intents: Intent[] = [];
  const user = { ...author };

  for (const match of text.matchAll(SEAT_RE)) {
    const [, roundToken, countToken, roleToken, bareRound] = match;
    if (bareRound !== undefined) {
      if (commandType === "remove") {
        intents.push({ type: "remove_participant", user, round: Number(bareRound) });
      }
      continue;
    }
    const role = normalizeRole(roleToken);
    if (!role) continue;
    const round = roundToken !== undefined ? Number(roundToken) : undefined;

    if (commandType === "add") {
      // "1차 2딜" still means one seat in round 1
      const count = round === undefined && countToken !== undefined ? Number(countToken) : 1;
      for (let i = 0; i < count; i++) {
        intents.push({ type: "add_participant", user, round, role });
      }
    } else if (round !== undefined) {
      intents.push({ type: "remove_participant", user, round, role });
    } else {
      const count = countToken !== undefined ? Number(countToken) : 1;
      intents.push({ type: "remove_participant", user, role, count });
    }
  }

  if (intents.length === 0 && commandType === "remove" && ALL_RE.test(text)) {
    intents.push({ type: "remove_participant", user });
  }
  return intents;
}

function parseEdits(text: string): Intent[] {
  const intents: Intent[] = [];
  for (const rawLine of text.split(/\r?\n|,(?=\s*\d+\s*차)/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const note = NOTE_RE.exec(line);
    if (note) {
      intents.push({ type: "update_note", round: Number(note[1]), note: (note[2] ?? "").trim() });
      continue;
    }
    const addRound = ADD_ROUND_RE.exec(line);
    if (addRound) {
      intents.push({ type: "add_round", round: Number(addRound[1]), when: (addRound[2] ?? "").trim() });
      continue;
    }
    const schedule = SCHEDULE_RE.exec(line);
    if (schedule) {
      const when = (schedule[2] ?? "").trim();
      if (when) intents.push({ type: "update_schedule", round: Number(schedule[1]), when });
    }
  }
  return intents;
}

/**
 * Extract intents for `author` from the text after the command prefix.
 * Participant commands always act on the author; edits act on rounds.
 */
export function parseCommandLocally(commandType: CommandType, text: string, author: UserRef): Intent[] {
  const intents = commandType === "edit" ? parseEdits(text) : parseSeats(commandType, text, author);
  return intents.slice(0, MAX_INTENTS_PER_COMMAND);
}

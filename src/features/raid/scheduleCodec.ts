/**
 * Raid Scheduler — src/features/raid/scheduleCodec.ts
 * WHAT: Parse the schedule text held in a thread's starter message, and render it back.
 * WHY: The rendered text is the single source of truth for a raid thread; every
 *      command re-derives RaidData from it rather than caching structured state.
 * FORMAT:
 *   # 레이드명 (설명)
 *
 *   🔹 info line
 *
 *   ## 1차
 *   - when: 토 21시
 *   - who:
 *     - 서포터(1/2): Eve
 *     - 딜러(2/6): Alice, <@1234567890>
 *   - note: 숙련자
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { displayRef, sameUser, toUserRef } from "./identity.js";
import { ROLE_LABEL } from "./roles.js";
import { buildPreferences, createRound, DEFAULT_CAPACITY, isEmptyRound, singleLine } from "./rounds.js";
import type { Capacity, RaidData, Role, Round, UserRef } from "./types.js";

/** Discord message content limit */
export const MESSAGE_LIMIT = 2000;
export const TRUNCATION_MARKER = "...";
export const INFO_MARKER = "🔹";

// Accepts "## 1차", "# 1차" and the legacy bare "1차"
const ROUND_RE = /^#?#?\s*(\d+)\s*차$/;
const COUNT_RE = /\(\s*(\d+)\s*\/\s*(\d+)\s*\)/;

export interface ParseOptions {
  /** Capacity for rounds whose participant lines carry no (n/max) count */
  capacity?: Capacity;
  /** Keep rounds that have neither participants nor when/note */
  keepEmptyRounds?: boolean;
}

export interface RenderOptions {
  keepEmptyRounds?: boolean;
}

export function emptyRaidData(header = ""): RaidData {
  return { header, infoLines: [], rounds: [], userPreferences: new Map() };
}

/** Recompute userPreferences after rounds were mutated. */
export function refreshPreferences(data: RaidData): void {
  data.userPreferences = buildPreferences(data.rounds);
}

function fieldValue(line: string, labels: readonly string[]): string | undefined {
  for (const label of labels) {
    if (line.startsWith(label)) return line.slice(label.length).trim();
  }
  return undefined;
}

function parseParticipantLine(line: string): { max?: number; users: UserRef[] } {
  const colon = line.indexOf(":");
  const head = colon === -1 ? line : line.slice(0, colon);
  const tail = colon === -1 ? "" : line.slice(colon + 1);
  const count = COUNT_RE.exec(head);
  const users: UserRef[] = [];
  for (const token of tail.split(",")) {
    const trimmed = token.trim();
    if (!trimmed) continue;
    const ref = toUserRef(trimmed);
    if (!users.some((u) => sameUser(u, ref))) users.push(ref);
  }
  return { max: count ? Number(count[2]) : undefined, users };
}

function assignParticipants(round: Round, role: Role, line: string): void {
  const { max, users } = parseParticipantLine(line);
  // a user already listed under the other role keeps that seat
  const other = role === "support" ? round.dealer : round.support;
  const unique = users.filter((u) => !other.some((o) => sameUser(o, u)));
  if (role === "support") {
    round.support = unique;
    if (max !== undefined) round.supportMax = max;
  } else {
    round.dealer = unique;
    if (max !== undefined) round.dealerMax = max;
  }
}

export function parseSchedule(text: string, options: ParseOptions = {}): RaidData {
  const capacity = options.capacity ?? DEFAULT_CAPACITY;
  const keepEmpty = options.keepEmptyRounds ?? false;
  const lines = text.trim().split(/\r?\n/);
  const data = emptyRaidData(lines[0]?.trim() ?? "");
  const byIndex = new Map<number, Round>();

  let current: Round | null = null;
  const flush = () => {
    if (current && (keepEmpty || !isEmptyRound(current))) {
      byIndex.set(current.index, current);
    }
  };

  for (const line of lines.slice(1)) {
    const stripped = line.trim();
    if (!stripped) continue;

    const roundMatch = ROUND_RE.exec(stripped);
    const roundIndex = roundMatch ? Number(roundMatch[1]) : NaN;
    if (Number.isSafeInteger(roundIndex) && roundIndex > 0) {
      flush();
      current = createRound(roundIndex, capacity);
      continue;
    }

    if (!current) {
      if (stripped.startsWith(INFO_MARKER)) data.infoLines.push(stripped);
      continue;
    }

    const when = fieldValue(stripped, ["- when:", "when:"]);
    if (when !== undefined) {
      current.when = when;
      continue;
    }
    if (fieldValue(stripped, ["- who:", "who:"]) !== undefined) continue;
    const note = fieldValue(stripped, ["- note:", "note:"]);
    if (note !== undefined) {
      current.note = note;
      continue;
    }
    const colon = stripped.indexOf(":");
    if (colon === -1) continue;
    // only the label decides the role; names after the colon may contain "서포터"
    const label = stripped.slice(0, colon);
    if (label.includes(ROLE_LABEL.support)) {
      assignParticipants(current, "support", stripped);
    } else if (label.includes(ROLE_LABEL.dealer)) {
      assignParticipants(current, "dealer", stripped);
    }
    // anything else is ignored so newer formats still parse
  }
  flush();

  data.rounds = [...byIndex.values()].sort((a, b) => a.index - b.index);
  refreshPreferences(data);
  return data;
}

function fieldLine(label: string, value: string): string {
  return value ? `${label} ${value}` : label;
}

function participantLine(round: Round, role: Role): string {
  const list = role === "support" ? round.support : round.dealer;
  const max = role === "support" ? round.supportMax : round.dealerMax;
  const names = list.map(displayRef).join(", ");
  return fieldLine(`  - ${ROLE_LABEL[role]}(${list.length}/${max}):`, names);
}

export function renderRounds(rounds: readonly Round[], options: RenderOptions = {}): string[] {
  const lines: string[] = [];
  const visible = [...rounds]
    .sort((a, b) => a.index - b.index)
    .filter((r) => options.keepEmptyRounds || !isEmptyRound(r));
  for (const round of visible) {
    lines.push(
      "",
      `## ${round.index}차`,
      fieldLine("- when:", singleLine(round.when)),
      "- who:",
      participantLine(round, "support"),
      participantLine(round, "dealer"),
      fieldLine("- note:", singleLine(round.note)),
    );
  }
  return lines;
}

export function renderSchedule(data: RaidData, options: RenderOptions = {}): string {
  const lines = [data.header];
  if (data.infoLines.length > 0) {
    lines.push("", ...data.infoLines);
  }
  lines.push(...renderRounds(data.rounds, options));
  return lines.join("\n");
}

export interface FittedText {
  text: string;
  truncated: boolean;
}

/**
 * Clamp text to the message limit. Over-long schedules lose their tail and get
 * a visible marker; this never throws.
 */
export function fitToMessageLimit(text: string, limit: number = MESSAGE_LIMIT): FittedText {
  if (text.length <= limit) return { text, truncated: false };
  let keep = Math.max(0, limit - TRUNCATION_MARKER.length);
  // don't split a surrogate pair (emoji such as 🔹)
  if (keep > 0 && isHighSurrogate(text.charCodeAt(keep - 1))) keep -= 1;
  return { text: text.slice(0, keep) + TRUNCATION_MARKER, truncated: true };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

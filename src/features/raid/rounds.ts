/**
 * Raid Scheduler — src/features/raid/rounds.ts
 * WHAT: Round-level primitives shared by the queue and reconciliation engines.
 * WHY: Capacity and double-booking checks must be identical on both paths.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { sameUser, userKey } from "./identity.js";
import type { Capacity, Role, Round, UserPreference, UserRef } from "./types.js";

export const DEFAULT_CAPACITY: Capacity = { supportMax: 2, dealerMax: 6 };

/** Highest round number a schedule can hold; "## N차" must render as plain digits. */
export const MAX_ROUND_INDEX = 999;

export function isRoundIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 1 && value <= MAX_ROUND_INDEX;
}

/** when/note values live on one line of the schedule text. */
export function singleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, " ").trim();
}

export function createRound(index: number, capacity: Capacity = DEFAULT_CAPACITY, when = ""): Round {
  return {
    index,
    when,
    note: "",
    supportMax: capacity.supportMax,
    dealerMax: capacity.dealerMax,
    support: [],
    dealer: [],
  };
}

export function cloneRound(round: Round): Round {
  return {
    ...round,
    support: round.support.map((u) => ({ ...u })),
    dealer: round.dealer.map((u) => ({ ...u })),
  };
}

export function roleList(round: Round, role: Role): UserRef[] {
  return role === "support" ? round.support : round.dealer;
}

export function roleMax(round: Round, role: Role): number {
  return role === "support" ? round.supportMax : round.dealerMax;
}

/** True when the user sits in either list of the round. */
export function hasUser(round: Round, user: UserRef): boolean {
  return round.support.some((u) => sameUser(u, user)) || round.dealer.some((u) => sameUser(u, user));
}

export function canPlace(round: Round, user: UserRef, role: Role): boolean {
  return !hasUser(round, user) && roleList(round, role).length < roleMax(round, role);
}

/**
 * A round with no participants and no when/note text.
 * Rounds carrying only scheduling metadata are kept.
 */
export function isEmptyRound(round: Round): boolean {
  const hasParticipants = round.support.length > 0 || round.dealer.length > 0;
  const hasInformation = round.when.trim() !== "" || round.note.trim() !== "";
  return !(hasParticipants || hasInformation);
}

export function findRound(rounds: readonly Round[], index: number): Round | undefined {
  return rounds.find((r) => r.index === index);
}

/** Insert keeping ascending index order. Caller guarantees the index is free. */
export function insertRound(rounds: Round[], round: Round): Round {
  const at = rounds.findIndex((r) => r.index > round.index);
  if (at === -1) rounds.push(round);
  else rounds.splice(at, 0, round);
  return round;
}

export function nextRoundIndex(rounds: readonly Round[]): number {
  return rounds.reduce((max, r) => Math.max(max, r.index), 0) + 1;
}

/** Remove the user from one list. Returns whether anything was removed. */
export function removeFromRole(round: Round, role: Role, user: UserRef): boolean {
  const list = roleList(round, role);
  const kept = list.filter((u) => !sameUser(u, user));
  if (kept.length === list.length) return false;
  if (role === "support") round.support = kept;
  else round.dealer = kept;
  return true;
}

export function buildPreferences(rounds: readonly Round[]): Map<string, UserPreference> {
  const prefs = new Map<string, UserPreference>();
  for (const round of rounds) {
    for (const user of [...round.support, ...round.dealer]) {
      const key = userKey(user);
      const pref = prefs.get(key) ?? { user: { ...user }, participation: 0, requestedRounds: [] };
      pref.participation += 1;
      pref.requestedRounds.push(round.index);
      prefs.set(key, pref);
    }
  }
  return prefs;
}

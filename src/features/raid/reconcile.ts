/**
 * Raid Scheduler — src/features/raid/reconcile.ts
 * WHAT: Applies a batch of intents to a parsed schedule ("parse, mutate, render").
 * WHY: The rendered starter message is the source of truth, so the bot survives
 *      restarts without losing confirmed seats. Business-rule rejections
 *      (full role, double-booking, unknown round) are silent no-ops; only a
 *      malformed intent throws.
 * FLOWS:
 *  - validate whole batch → dispatch each intent in order → sweep empty rounds
 *  - consecutive round-less adds are placed in queue priority order
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { InvalidIntentError } from "../../lib/errors.js";
import { userKey } from "./identity.js";
import { compareByRankAndRole } from "./raidQueue.js";
import { ROLE_LABEL } from "./roles.js";
import {
  canPlace,
  createRound,
  DEFAULT_CAPACITY,
  findRound,
  hasUser,
  insertRound,
  isEmptyRound,
  isRoundIndex,
  MAX_ROUND_INDEX,
  nextRoundIndex,
  removeFromRole,
  roleList,
} from "./rounds.js";
import { refreshPreferences } from "./scheduleCodec.js";
import type {
  AddParticipantIntent,
  Capacity,
  Intent,
  RaidData,
  RemoveParticipantIntent,
  Role,
  Round,
} from "./types.js";

/**
 * What a round-less add does when no existing round can take it.
 * strict: nothing (the thread-command default). elastic: open round max+1.
 */
export type OverflowPolicy = "strict" | "elastic";

export interface ApplyOptions {
  /** capacity for rounds created by this batch */
  capacity?: Capacity;
  overflow?: OverflowPolicy;
}

export interface ApplyResult {
  changed: boolean;
  changes: string[];
}

const INTENT_TYPES = new Set<string>([
  "add_participant",
  "remove_participant",
  "update_schedule",
  "add_round",
  "update_note",
]);

function assertRound(value: number | undefined, required: boolean, intent: Intent): void {
  if (value === undefined) {
    if (required) throw new InvalidIntentError(`${intent.type} requires a round`);
    return;
  }
  if (!isRoundIndex(value)) {
    throw new InvalidIntentError(`${intent.type}: round must be an integer from 1 to ${MAX_ROUND_INDEX}, got ${value}`);
  }
}

function assertValidIntent(intent: Intent): void {
  if (!INTENT_TYPES.has(intent.type)) {
    throw new InvalidIntentError(`unknown intent type: ${String(intent.type)}`);
  }
  switch (intent.type) {
    case "add_participant":
    case "remove_participant":
      if (!intent.user.name.trim() && !intent.user.id) {
        throw new InvalidIntentError(`${intent.type} requires a user`);
      }
      assertRound(intent.round, false, intent);
      if (intent.type === "remove_participant" && intent.count !== undefined) {
        if (!Number.isInteger(intent.count) || intent.count < 1) {
          throw new InvalidIntentError(`remove_participant: count must be a positive integer`);
        }
      }
      return;
    default:
      assertRound(intent.round, true, intent);
  }
}

function label(index: number): string {
  return `${index}차`;
}

class Reconciler {
  readonly changes: string[] = [];
  private readonly capacity: Capacity;
  private readonly overflow: OverflowPolicy;

  constructor(
    private readonly data: RaidData,
    options: ApplyOptions
  ) {
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.overflow = options.overflow ?? "strict";
  }

  private ensureRound(index: number, when = ""): Round {
    return findRound(this.data.rounds, index) ?? insertRound(this.data.rounds, createRound(index, this.capacity, when));
  }

  private seat(round: Round, intent: AddParticipantIntent): void {
    roleList(round, intent.role).push({ ...intent.user });
    this.changes.push(`${intent.user.name}님이 ${label(round.index)}의 ${ROLE_LABEL[intent.role]}로 추가됨`);
  }

  addToRound(intent: AddParticipantIntent & { round: number }): void {
    const round = this.ensureRound(intent.round);
    if (!canPlace(round, intent.user, intent.role)) {
      logger.debug(
        { evt: "raid_add_rejected", user: intent.user.name, round: intent.round, role: intent.role },
        hasUser(round, intent.user) ? "[reconcile] user already in round" : "[reconcile] role full"
      );
      return;
    }
    this.seat(round, intent);
  }

  /** First round (ascending) that fits; scaffolds round 1 on an empty schedule. */
  addAnywhere(intent: AddParticipantIntent): void {
    const rounds = this.data.rounds;
    if (rounds.length === 0) {
      this.seat(this.ensureRound(1), intent);
      return;
    }
    const target = rounds.find((r) => canPlace(r, intent.user, intent.role));
    if (target) {
      this.seat(target, intent);
      return;
    }
    if (this.overflow === "elastic") {
      this.seat(insertRound(rounds, createRound(nextRoundIndex(rounds), this.capacity)), intent);
      return;
    }
    logger.debug(
      { evt: "raid_add_no_round", user: intent.user.name, role: intent.role },
      "[reconcile] no round can take round-less add"
    );
  }

  /**
   * Place a run of round-less adds by queue priority: current participation
   * DESC, then supports first. Ties keep arrival order.
   */
  addRun(run: AddParticipantIntent[]): void {
    refreshPreferences(this.data);
    const ranked = run.map((intent) => ({
      intent,
      role: intent.role,
      rank: this.data.userPreferences.get(userKey(intent.user))?.participation ?? 0,
    }));
    ranked.sort(compareByRankAndRole);
    for (const { intent } of ranked) this.addAnywhere(intent);
  }

  private strip(round: Round, role: Role, intent: RemoveParticipantIntent): boolean {
    if (!removeFromRole(round, role, intent.user)) return false;
    this.changes.push(`${intent.user.name}님이 ${label(round.index)}의 ${ROLE_LABEL[role]}에서 제거됨`);
    return true;
  }

  remove(intent: RemoveParticipantIntent): void {
    const roles: Role[] = intent.role ? [intent.role] : ["support", "dealer"];

    if (intent.round !== undefined) {
      const round = findRound(this.data.rounds, intent.round);
      if (!round) return;
      for (const role of roles) this.strip(round, role, intent);
      return;
    }

    if (intent.count !== undefined && intent.role) {
      // "2딜 제거": drop the latest N dealer seats
      let remaining = intent.count;
      for (const round of [...this.data.rounds].reverse()) {
        if (remaining <= 0) break;
        if (this.strip(round, intent.role, intent)) remaining -= 1;
      }
      return;
    }

    for (const round of this.data.rounds) {
      for (const role of roles) this.strip(round, role, intent);
    }
  }

  updateSchedule(index: number, when: string): void {
    const round = this.ensureRound(index);
    round.when = when;
    this.changes.push(`${label(index)}의 일정이 '${when}'로 업데이트됨`);
  }

  addRound(index: number, when: string): void {
    if (findRound(this.data.rounds, index)) return;
    insertRound(this.data.rounds, createRound(index, this.capacity, when));
    this.changes.push(`새로운 차수 ${label(index)}이(가) 추가됨`);
  }

  updateNote(index: number, note: string): void {
    const round = findRound(this.data.rounds, index);
    if (!round) return;
    round.note = note;
    this.changes.push(`${label(index)}의 노트가 업데이트됨`);
  }

  sweep(): void {
    const before = this.data.rounds.length;
    this.data.rounds = this.data.rounds.filter((r) => !isEmptyRound(r));
    const removed = before - this.data.rounds.length;
    if (removed > 0) {
      this.changes.push(`${removed}개의 빈 차수가 제거되었습니다`);
    }
  }
}

function isRoundlessAdd(intent: Intent): intent is AddParticipantIntent & { round?: undefined } {
  return intent.type === "add_participant" && intent.round === undefined;
}

/**
 * Apply intents in order, mutating `data`. Returns the human-readable change
 * log; an empty log means nothing changed (for whatever reason).
 */
export function applyIntents(data: RaidData, intents: readonly Intent[], options: ApplyOptions = {}): ApplyResult {
  // validate up front so a bad intent never leaves a half-applied batch
  for (const intent of intents) assertValidIntent(intent);

  const reconciler = new Reconciler(data, options);
  let i = 0;
  while (i < intents.length) {
    const intent = intents[i];
    if (!intent) break;

    if (isRoundlessAdd(intent)) {
      const run: AddParticipantIntent[] = [];
      while (i < intents.length) {
        const next = intents[i];
        if (!next || !isRoundlessAdd(next)) break;
        run.push(next);
        i += 1;
      }
      reconciler.addRun(run);
      continue;
    }

    switch (intent.type) {
      case "add_participant":
        if (intent.round !== undefined) reconciler.addToRound({ ...intent, round: intent.round });
        break;
      case "remove_participant":
        reconciler.remove(intent);
        break;
      case "update_schedule":
        reconciler.updateSchedule(intent.round, intent.when);
        break;
      case "add_round":
        reconciler.addRound(intent.round, intent.when);
        break;
      case "update_note":
        reconciler.updateNote(intent.round, intent.note);
        break;
    }
    i += 1;
  }

  reconciler.sweep();
  refreshPreferences(data);
  return { changed: reconciler.changes.length > 0, changes: reconciler.changes };
}

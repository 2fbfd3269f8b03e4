/**
 * Raid Scheduler — src/features/raid/raidQueue.ts
 * WHAT: Per-thread priority queue of participation requests, and the two-pass
 *       round packing that turns the queue into a schedule.
 * WHY: Priority favours users who have already committed to more slots, then
 *      supports over dealers. Explicit round requests are hard constraints;
 *      round-less requests overflow into new rounds.
 * FLOWS:
 *  - enqueue → bump participation → stable re-sort
 *  - dequeue → cascading match → remove first hit → decrement (floor 0)
 *  - generateScheduleMessage → copy → explicit pass → scaffold → elastic pass → render
 * STATE: in-memory only. A process restart drops every queued request; the
 *        rendered message is what survives.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { InvalidIntentError } from "../../lib/errors.js";
import { mentionId, resolvedId, userKey } from "./identity.js";
import {
  canPlace,
  cloneRound,
  createRound,
  DEFAULT_CAPACITY,
  findRound,
  insertRound,
  isEmptyRound,
  MAX_ROUND_INDEX,
  nextRoundIndex,
  roleList,
} from "./rounds.js";
import { fitToMessageLimit, refreshPreferences, renderSchedule, emptyRaidData } from "./scheduleCodec.js";
import type {
  Capacity,
  ParticipantRequest,
  RaidData,
  Role,
  Round,
  UserParticipation,
  UserRef,
} from "./types.js";

export const DEFAULT_QUEUE_HEADER = "# 레이드 일정";

function roleWeight(role: Role): number {
  return role === "support" ? 1 : 0;
}

/** participation rank DESC, then support before dealer */
export function compareByRankAndRole(a: { rank: number; role: Role }, b: { rank: number; role: Role }): number {
  if (a.rank !== b.rank) return b.rank - a.rank;
  return roleWeight(b.role) - roleWeight(a.role);
}

/** explicit round first, then rank and role */
export function compareRequests(a: ParticipantRequest, b: ParticipantRequest): number {
  const explicitA = a.round > 0 ? 1 : 0;
  const explicitB = b.round > 0 ? 1 : 0;
  if (explicitA !== explicitB) return explicitB - explicitA;
  return compareByRankAndRole(a, b);
}

function assertRoundIndex(round: number): void {
  if (!Number.isInteger(round) || round < 0 || round > MAX_ROUND_INDEX) {
    throw new InvalidIntentError(`round must be an integer from 0 to ${MAX_ROUND_INDEX}, got ${round}`);
  }
}

export interface GenerateOptions {
  capacity?: Capacity;
  header?: string;
  infoLines?: string[];
  /**
   * Existing rounds whose when/note should carry over. Participants on these
   * rounds are ignored; the queue is the source of who goes where.
   */
  baseRounds?: readonly Round[];
  limit?: number;
}

export interface ScheduleResult {
  text: string;
  truncated: boolean;
  rounds: Round[];
  /** explicit-round requests that could not be placed */
  dropped: ParticipantRequest[];
}

export class RaidQueue {
  private readonly requests: ParticipantRequest[] = [];
  private readonly participation = new Map<string, UserParticipation>();

  get size(): number {
    return this.requests.length;
  }

  /** Snapshot of the queue in priority order. */
  pending(): ParticipantRequest[] {
    return this.requests.map((r) => ({ ...r, user: { ...r.user } }));
  }

  participationOf(user: UserRef): number {
    return this.participation.get(userKey(user))?.count ?? 0;
  }

  enqueue(user: UserRef, role: Role, round = 0): ParticipantRequest {
    assertRoundIndex(round);
    const key = userKey(user);
    const entry = this.participation.get(key) ?? { user: { ...user }, count: 0 };
    entry.count += 1;
    this.participation.set(key, entry);

    const request: ParticipantRequest = {
      round,
      rank: entry.count,
      role,
      user: { ...user },
    };
    this.requests.push(request);
    // Array.prototype.sort is stable, so equal keys keep insertion order
    this.requests.sort(compareRequests);
    return request;
  }

  /**
   * Remove at most one request. Match order: exact name (case-insensitive),
   * then the caller's mention id against stored ids, then stored mention
   * names against the caller's id. Role/round filter when given.
   */
  dequeue(user: UserRef | string, role?: Role, round?: number): ParticipantRequest | null {
    const query: UserRef = typeof user === "string" ? { name: user } : user;
    const queryName = query.name.trim().toLowerCase();
    const queryId = resolvedId(query);

    const eligible = (r: ParticipantRequest) =>
      (role === undefined || r.role === role) && (round === undefined || round <= 0 || r.round === round);

    const strategies: Array<(r: ParticipantRequest) => boolean> = [
      (r) => r.user.name.trim().toLowerCase() === queryName,
      (r) => queryId !== undefined && r.user.id === queryId,
      (r) => queryId !== undefined && mentionId(r.user.name) === queryId,
    ];

    for (const matches of strategies) {
      const at = this.requests.findIndex((r) => eligible(r) && matches(r));
      if (at === -1) continue;
      const [removed] = this.requests.splice(at, 1);
      if (!removed) return null;
      const entry = this.participation.get(userKey(removed.user));
      if (entry) entry.count = Math.max(0, entry.count - 1);
      return removed;
    }
    return null;
  }

  /**
   * Pack the queue into rounds and render. Works on a copy; the live queue is
   * never consumed by rendering.
   */
  generateScheduleMessage(options: GenerateOptions = {}): ScheduleResult {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    const work = this.pending();
    const rounds: Round[] = (options.baseRounds ?? []).map((r) => ({
      ...cloneRound(r),
      support: [],
      dealer: [],
    }));
    rounds.sort((a, b) => a.index - b.index);
    const dropped: ParticipantRequest[] = [];

    // Pass 1: explicit rounds are hard capacity. No overflow, no fallback.
    const explicit = work.filter((r) => r.round > 0);
    for (const request of explicit) {
      const round = findRound(rounds, request.round) ?? insertRound(rounds, createRound(request.round, capacity));
      if (canPlace(round, request.user, request.role)) {
        roleList(round, request.role).push(request.user);
      } else {
        dropped.push(request);
        logger.debug(
          { evt: "raid_queue_drop", user: request.user.name, role: request.role, round: request.round },
          "[raidQueue] explicit-round request did not fit"
        );
      }
    }

    let scaffold: Round | undefined;
    if (explicit.length === 0 && rounds.length === 0) {
      scaffold = insertRound(rounds, createRound(1, capacity));
    }

    // Pass 2: round-less requests go to the first round that fits, else a new one
    const elastic = work.filter((r) => r.round === 0).sort(compareByRankAndRole);
    for (const request of elastic) {
      const target =
        rounds.find((round) => canPlace(round, request.user, request.role)) ??
        insertRound(rounds, createRound(nextRoundIndex(rounds), capacity));
      roleList(target, request.role).push(request.user);
    }

    const kept = rounds.filter((r) => r === scaffold || !isEmptyRound(r));
    const data: RaidData = {
      ...emptyRaidData(options.header ?? DEFAULT_QUEUE_HEADER),
      infoLines: [...(options.infoLines ?? [])],
      rounds: kept,
    };
    refreshPreferences(data);
    const fitted = fitToMessageLimit(renderSchedule(data, { keepEmptyRounds: true }), options.limit);
    return { text: fitted.text, truncated: fitted.truncated, rounds: kept, dropped };
  }
}

/** Thread-keyed table of queues. Each thread's queue is independent. */
export class RaidQueueManager {
  private readonly queues = new Map<string, RaidQueue>();

  get(threadId: string): RaidQueue {
    let queue = this.queues.get(threadId);
    if (!queue) {
      queue = new RaidQueue();
      this.queues.set(threadId, queue);
    }
    return queue;
  }

  has(threadId: string): boolean {
    return this.queues.has(threadId);
  }

  delete(threadId: string): boolean {
    return this.queues.delete(threadId);
  }

  get size(): number {
    return this.queues.size;
  }

  /**
   * Replace a thread's queue with one seeded from a parsed schedule. Every
   * seat becomes a round-less request, so the next render repacks from scratch.
   */
  seedFromSchedule(threadId: string, data: RaidData): RaidQueue {
    const queue = new RaidQueue();
    for (const round of [...data.rounds].sort((a, b) => a.index - b.index)) {
      for (const user of round.support) queue.enqueue(user, "support");
      for (const user of round.dealer) queue.enqueue(user, "dealer");
    }
    this.queues.set(threadId, queue);
    return queue;
  }
}

/**
 * Raid Scheduler — src/features/raid/types.ts
 * WHAT: Shared types for the raid schedule engine (rounds, intents, queue requests).
 * WHY: Codec, queue, and reconciliation all operate over the same shapes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type Role = "support" | "dealer";

/**
 * A participant as written in a schedule or named by an intent.
 * `id` is the Discord snowflake when known; `name` is whatever was displayed.
 */
export interface UserRef {
  name: string;
  id?: string;
}

export interface Capacity {
  supportMax: number;
  dealerMax: number;
}

export interface Round {
  index: number;
  when: string;
  note: string;
  supportMax: number;
  dealerMax: number;
  support: UserRef[];
  dealer: UserRef[];
}

/**
 * Per-user rollup derived from the rendered rounds.
 * participation = number of rounds the user currently occupies.
 */
export interface UserPreference {
  user: UserRef;
  participation: number;
  requestedRounds: number[];
}

export interface RaidData {
  header: string;
  infoLines: string[];
  rounds: Round[];
  /** keyed by userKey() */
  userPreferences: Map<string, UserPreference>;
}

// ===== Intents =====

export interface AddParticipantIntent {
  type: "add_participant";
  user: UserRef;
  round?: number;
  role: Role;
}

export interface RemoveParticipantIntent {
  type: "remove_participant";
  user: UserRef;
  round?: number;
  role?: Role;
  /** Only meaningful with a role and no round: strip from the latest N rounds. */
  count?: number;
}

export interface UpdateScheduleIntent {
  type: "update_schedule";
  round: number;
  when: string;
}

export interface AddRoundIntent {
  type: "add_round";
  round: number;
  when: string;
}

export interface UpdateNoteIntent {
  type: "update_note";
  round: number;
  note: string;
}

export type Intent =
  | AddParticipantIntent
  | RemoveParticipantIntent
  | UpdateScheduleIntent
  | AddRoundIntent
  | UpdateNoteIntent;

export type IntentType = Intent["type"];

/** Thread command prefix → command type */
export type CommandType = "add" | "remove" | "edit";

// ===== Queue =====

export interface ParticipantRequest {
  /** 0 = system picks the round */
  round: number;
  /** participation count at enqueue time (post-increment) */
  rank: number;
  role: Role;
  user: UserRef;
}

export interface UserParticipation {
  user: UserRef;
  count: number;
}

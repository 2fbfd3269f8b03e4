/**
 * Raid Scheduler — src/features/raid/identity.ts
 * WHAT: UserRef construction, mention parsing, and equality.
 * WHY: Schedules mix plain display names with <@id> mentions. Two refs are the
 *      same user when their ids match; names are only compared when an id is
 *      missing on at least one side. Never substring matching.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { UserRef } from "./types.js";

const MENTION_RE = /^<@!?(\d{5,25})>$/;

/** Extract the snowflake from `<@123>` / `<@!123>`; undefined for anything else. */
export function mentionId(text: string): string | undefined {
  const match = MENTION_RE.exec(text.trim());
  return match?.[1];
}

export function toUserRef(token: string, id?: string): UserRef {
  const name = token.trim();
  const resolved = id ?? mentionId(name);
  return resolved ? { name, id: resolved } : { name };
}

export function resolvedId(ref: UserRef): string | undefined {
  return ref.id ?? mentionId(ref.name);
}

export function sameUser(a: UserRef, b: UserRef): boolean {
  const aId = resolvedId(a);
  const bId = resolvedId(b);
  if (aId && bId) return aId === bId;
  return a.name.toLowerCase() === b.name.toLowerCase();
}

/** Stable map key for per-user rollups. */
export function userKey(ref: UserRef): string {
  const id = resolvedId(ref);
  return id ? `id:${id}` : `name:${ref.name.toLowerCase()}`;
}

/** How a participant is written back into the schedule text. */
export function displayRef(ref: UserRef): string {
  const id = resolvedId(ref);
  // commas and newlines would split the rendered list
  return id ? `<@${id}>` : ref.name.replace(/[,\n]/g, " ").trim();
}

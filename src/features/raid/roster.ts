/**
 * Raid Scheduler — src/features/raid/roster.ts
 * WHAT: Guild member roster from config/members.yaml; gates who may run thread commands.
 * WHY: Raid threads are public in the guild, but only static members edit schedules.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { z } from "zod";
import { logger } from "../../lib/logger.js";

const memberSchema = z.object({
  name: z.string().trim().min(1),
  // YAML reads unquoted snowflakes as numbers and loses precision; insist on strings
  discord_id: z.string().regex(/^\d{5,25}$/, "discord_id must be a quoted snowflake"),
  active: z.boolean().default(true),
  main_characters: z.array(z.string().trim().min(1)).default([]),
});

const rosterFileSchema = z.object({ members: z.array(memberSchema).default([]) });

export type RosterMember = z.infer<typeof memberSchema>;

export interface Roster {
  members: RosterMember[];
  /** ids of active members */
  allowed: Set<string>;
}

export function buildRoster(members: RosterMember[]): Roster {
  return { members, allowed: new Set(members.filter((m) => m.active).map((m) => m.discord_id)) };
}

export function parseRoster(text: string): Roster {
  const doc: unknown = parse(text) ?? {};
  const parsed = rosterFileSchema.safeParse(Array.isArray(doc) ? { members: doc } : doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid member roster:\n${issues}`);
  }
  return buildRoster(parsed.data.members);
}

export function loadRoster(filePath: string): Roster {
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (err) {
    logger.warn({ evt: "roster_missing", filePath, err }, "[roster] member roster not readable; allowing everyone");
    return buildRoster([]);
  }
  const roster = parseRoster(text);
  logger.info({ evt: "roster_loaded", filePath, active: roster.allowed.size }, "[roster] roster loaded");
  return roster;
}

/** An empty roster allows everyone. */
export function isAllowed(roster: Roster, userId: string): boolean {
  return roster.allowed.size === 0 || roster.allowed.has(userId);
}

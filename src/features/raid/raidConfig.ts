/**
 * Raid Scheduler — src/features/raid/raidConfig.ts
 * WHAT: Raid definitions from config/raids.yaml, seat capacity, and the starter-message template.
 * WHY: Adding a raid is a YAML edit, not a deploy.
 * FLOWS:
 *  - loadRaids(path) → yaml.parse → zod → RaidDefinition[]
 *  - buildRaidTemplate(raid) → header + info lines + empty round 1
 * DOCS:
 *  - yaml: https://eemeli.org/yaml/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { createRound } from "./rounds.js";
import { emptyRaidData, INFO_MARKER, renderSchedule } from "./scheduleCodec.js";
import type { Capacity } from "./types.js";

const raidSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().trim().default(""),
  min_level: z.coerce.number().nonnegative(),
  max_level: z.coerce.number().nonnegative().nullish(),
  members: z.coerce.number().int().positive().default(8),
  /** expected clear time in minutes */
  elapsed_time: z.coerce.number().int().nonnegative().nullish(),
});

const raidsFileSchema = z.object({ raids: z.array(raidSchema).default([]) });

export type RaidDefinition = z.infer<typeof raidSchema>;

/** Parse YAML text. Throws with every zod issue on an invalid file. */
export function parseRaids(text: string): RaidDefinition[] {
  const doc: unknown = parse(text) ?? {};
  // a bare list is accepted as the raids array
  const parsed = raidsFileSchema.safeParse(Array.isArray(doc) ? { raids: doc } : doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid raid config:\n${issues}`);
  }
  return parsed.data.raids;
}

/** A missing file means no raids; a malformed one is a startup error. */
export function loadRaids(filePath: string): RaidDefinition[] {
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (err) {
    logger.warn({ evt: "raid_config_missing", filePath, err }, "[raidConfig] raid config not readable; no raids");
    return [];
  }
  const raids = parseRaids(text);
  logger.info({ evt: "raid_config_loaded", filePath, count: raids.length }, "[raidConfig] raids loaded");
  return raids;
}

/** "카멘 (하드)": names repeat across difficulties, labels don't. */
export function raidLabel(raid: RaidDefinition): string {
  return raid.description ? `${raid.name} (${raid.description})` : raid.name;
}

/** Exact label first, then the first raid with that bare name. */
export function findRaid(raids: readonly RaidDefinition[], query: string): RaidDefinition | undefined {
  const wanted = query.trim().toLowerCase();
  return (
    raids.find((r) => raidLabel(r).toLowerCase() === wanted) ?? raids.find((r) => r.name.toLowerCase() === wanted)
  );
}

/** 4-player raids seat 1 support + 3 dealers; everything else is a full party of 2 + 6. */
export function capacityForMembers(members: number): Capacity {
  return members === 4 ? { supportMax: 1, dealerMax: 3 } : { supportMax: 2, dealerMax: 6 };
}

export function levelRange(raid: RaidDefinition): string {
  return raid.max_level ? `${raid.min_level} ~ ${raid.max_level}` : `${raid.min_level} 이상`;
}

export function buildRaidTemplate(raid: RaidDefinition): string {
  const data = emptyRaidData(`# ${raidLabel(raid)}`);
  data.infoLines = [`${INFO_MARKER} 필요 레벨: ${levelRange(raid)}`, `${INFO_MARKER} 모집 인원: ${raid.members}명`];
  data.rounds = [createRound(1, capacityForMembers(raid.members))];
  return renderSchedule(data, { keepEmptyRounds: true });
}

export function threadNameFor(raid: RaidDefinition): string {
  return `${raid.name} 모집 스레드`;
}

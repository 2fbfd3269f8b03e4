// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// buildCommands() returns the JSON payloads that get PUT to Discord's API.
//
// GOTCHA: global commands take up to an hour to propagate; set GUILD_ID during
// development so scripts/deploy-commands.ts registers guild-scoped commands instead.

import { data as channelData } from "./channel/data.js";
import { data as characterData } from "./character/data.js";
import { buildRaidData } from "./raid/data.js";
import type { RaidDefinition } from "../features/raid/raidConfig.js";

/** /raid create offers the configured raids as choices, so the raid list is an input. */
export function buildCommands(raids: readonly RaidDefinition[]) {
  return [buildRaidData(raids).toJSON(), characterData.toJSON(), channelData.toJSON()];
}

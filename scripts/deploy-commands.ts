/**
 * Raid Scheduler — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite slash commands and verify the /raid subcommands landed.
 * WHY: Guild-scoped commands update instantly; global ones take up to an hour.
 * FLOWS: load raids → build commands → REST PUT (guild when GUILD_ID is set, else global) → verify
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { env } from "../src/lib/env.js";
import { buildCommands } from "../src/commands/buildCommands.js";
import { loadRaids } from "../src/features/raid/raidConfig.js";

const EXPECTED_RAID_SUBCOMMANDS = ["list", "create", "schedule", "rebalance", "history"];

function namesOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const names: string[] = [];
  for (const item of value) {
    if (typeof item !== "object" || item === null) continue;
    const name: unknown = Reflect.get(item, "name");
    if (typeof name === "string") names.push(name);
  }
  return names;
}

function findByName(value: unknown, name: string): unknown {
  if (!Array.isArray(value)) return undefined;
  return value.find((item: unknown) => typeof item === "object" && item !== null && Reflect.get(item, "name") === name);
}

/** Missing subcommands on the registered /raid, empty when everything is there. */
export function missingRaidSubcommands(registered: unknown): string[] {
  const raid = findByName(registered, "raid");
  const options = typeof raid === "object" && raid !== null ? Reflect.get(raid, "options") : undefined;
  const present = namesOf(options);
  return EXPECTED_RAID_SUBCOMMANDS.filter((sub) => !present.includes(sub));
}

export async function deployCommands(): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const commands = buildCommands(loadRaids(env.RAIDS_CONFIG));
  const route = env.GUILD_ID
    ? Routes.applicationGuildCommands(env.CLIENT_ID, env.GUILD_ID)
    : Routes.applicationCommands(env.CLIENT_ID);

  console.log(`[deploy] registering ${commands.length} commands ${env.GUILD_ID ? `to guild ${env.GUILD_ID}` : "globally"}`);
  await rest.put(route, { body: commands });

  const registered = await rest.get(route);
  const missing = missingRaidSubcommands(registered);
  if (missing.length > 0) {
    console.error(`[deploy] /raid is missing subcommands: ${missing.join(", ")}`);
    process.exit(1);
  }
  console.log(`[deploy] ok: ${namesOf(registered).join(", ")}`);
}

// only run when executed directly, not when imported
if (import.meta.url === `file://${(process.argv[1] ?? "").replace(/\\/g, "/")}`) {
  await deployCommands();
}

/**
 * Raid Scheduler — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, wires services, routes interactions and thread commands.
 * WHY: Startup order and the hot paths are easiest to reason about in one place.
 * FLOWS:
 *  - Boot: Sentry → config (raids, roster) → intent cache + extractor → client
 *  - Ready: cache sweep scheduler → character sync scheduler → health endpoint
 *  - Interaction: slash command → wrapCommand handler
 *  - messageCreate: thread command listener (wrapped, serialized per thread)
 *  - SIGINT/SIGTERM: stop schedulers → close health server → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js v14: https://discord.js.org/#/docs/discord.js/main/general/welcome
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { captureException, flushSentry, initializeSentry, setTag } from "./lib/sentry.js";
initializeSentry();

import type { Server } from "node:http";
import Anthropic from "@anthropic-ai/sdk";
import {
  Client,
  Collection,
  Events,
  GatewayIntentBits,
  MessageFlags,
  type ChatInputCommandInteraction,
  type Interaction,
} from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { wrapCommand } from "./lib/cmdWrap.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { closeDatabase } from "./db/db.js";
import { loadRaids } from "./features/raid/raidConfig.js";
import { loadRoster } from "./features/raid/roster.js";
import { FileCacheBackend, IntentCache } from "./features/raid/intentCache.js";
import { AnthropicIntentModel, IntentExtractor } from "./features/raid/intentExtractor.js";
import { RaidQueueManager } from "./features/raid/raidQueue.js";
import { LostArkClient } from "./features/lostark/lostArkClient.js";
import { buildLevelUpEmbeds, CharacterSyncer } from "./features/lostark/characterSync.js";
import { listAllMemberCharacters, type LevelUp } from "./store/memberCharacterStore.js";
import * as raid from "./commands/raid/index.js";
import * as character from "./commands/character/index.js";
import * as channel from "./commands/channel/index.js";
import * as raidThreadCommand from "./listeners/raidThreadCommand.js";
import { createThreadDeleteListener, createThreadUpdateListener } from "./listeners/raidThreadLifecycle.js";
import { startIntentCacheSweep, stopIntentCacheSweep } from "./scheduler/intentCacheSweep.js";
import { startCharacterSync, stopCharacterSync } from "./scheduler/characterSyncScheduler.js";
import { startStatusServer } from "./web/statusEndpoint.js";

// ===== Global Error Handlers =====
process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // don't exit; discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.fatal({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  void flushSentry().finally(() => process.exit(1));
});

// ===== Services =====
const raids = loadRaids(env.RAIDS_CONFIG);
const roster = loadRoster(env.MEMBERS_CONFIG);
const queues = new RaidQueueManager();

const intentCache = new IntentCache(new FileCacheBackend(env.INTENT_CACHE_DIR));
const intentModel = env.ANTHROPIC_API_KEY
  ? new AnthropicIntentModel(new Anthropic({ apiKey: env.ANTHROPIC_API_KEY }), env.ANTHROPIC_MODEL)
  : undefined;
if (!intentModel) {
  logger.warn("[startup] ANTHROPIC_API_KEY not set; thread commands use the local pattern parser");
}
const extractor = new IntentExtractor({ cache: intentCache, model: intentModel, timeoutMs: env.INTENT_TIMEOUT_MS });

const lostArk = env.LOSTARK_API_KEY ? new LostArkClient({ apiKey: env.LOSTARK_API_KEY }) : undefined;
const characterSyncer = lostArk ? new CharacterSyncer({ client: lostArk, roster }) : undefined;

// ===== Client =====
// MessageContent is privileged: enable it in the developer portal or thread commands see empty text
export const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
});

type CommandHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;
const commands = new Collection<string, CommandHandler>();
commands.set(
  "raid",
  wrapCommand("raid", raid.createRaidExecutor({ raids, queues, roster, characters: listAllMemberCharacters }))
);
commands.set(
  character.data.name,
  wrapCommand("character", character.createCharacterExecutor({ client: lostArk, syncer: characterSyncer, raids }))
);
commands.set(channel.data.name, wrapCommand("channel", channel.createChannelExecutor()));

/** Discord takes at most 10 embeds per message. */
async function announceLevelUps(levelUps: readonly LevelUp[]): Promise<void> {
  const channelId = env.CHARACTER_UPDATES_CHANNEL_ID;
  if (!channelId) return;
  const target = await client.channels.fetch(channelId);
  if (!target || !target.isSendable()) {
    logger.warn({ evt: "character_updates_channel_unusable", channelId }, "[characterSync] updates channel not sendable");
    return;
  }
  const embeds = buildLevelUpEmbeds(levelUps);
  for (let i = 0; i < embeds.length; i += 10) {
    await target.send({ embeds: embeds.slice(i, i + 10), allowedMentions: { parse: [] } });
  }
}

let statusServer: Server | null = null;

client.once(Events.ClientReady, (ready) => {
  logger.info({ tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size, raids: raids.length }, "Bot ready");
  setTag("bot_id", ready.user.id);

  startIntentCacheSweep(intentCache, env.INTENT_CACHE_HORIZON_DAYS * 24 * 60 * 60 * 1000);
  if (characterSyncer) {
    startCharacterSync(characterSyncer, announceLevelUps);
  } else {
    logger.warn("[startup] LOSTARK_API_KEY not set; character sync disabled");
  }
  statusServer = startStatusServer(
    {
      isReady: () => client.isReady(),
      wsPing: () => client.ws.ping,
      guildCount: () => client.guilds.cache.size,
      queueCount: () => queues.size,
    },
    env.HEALTH_PORT
  );
});

client.on(
  Events.InteractionCreate,
  wrapEvent("interactionCreate", async (interaction: Interaction) => {
    if (!interaction.isChatInputCommand()) return;
    const handler = commands.get(interaction.commandName);
    if (!handler) {
      logger.warn({ evt: "unknown_command", cmd: interaction.commandName }, "[interaction] unknown command");
      await interaction.reply({ content: "알 수 없는 명령어입니다.", flags: MessageFlags.Ephemeral });
      return;
    }
    await handler(interaction);
  }, 30_000)
);

// LLM extraction (20s) plus retries and message edits need more than the default event budget
client.on(
  raidThreadCommand.name,
  wrapEvent(
    "messageCreate",
    raidThreadCommand.createThreadCommandListener({ extractor, roster, overflow: env.SCHEDULE_OVERFLOW }),
    90_000
  )
);

client.on(Events.ThreadUpdate, wrapEvent("threadUpdate", createThreadUpdateListener({ queues })));
client.on(Events.ThreadDelete, wrapEvent("threadDelete", createThreadDeleteListener({ queues })));

client.on(Events.Error, (err) => {
  logger.error({ evt: "client_error", err }, "[client] error");
});

// ===== Graceful Shutdown =====
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  stopIntentCacheSweep();
  stopCharacterSync();
  if (statusServer) {
    const server = statusServer;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
  try {
    await client.destroy();
  } catch (err) {
    logger.warn({ err }, "[shutdown] client destroy failed");
  }
  closeDatabase();
  await flushSentry();
  logger.info("[shutdown] complete");
  process.exit(0);
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

try {
  await client.login(env.DISCORD_TOKEN);
} catch (err) {
  logger.fatal({ err }, "[startup] Discord login failed");
  await flushSentry();
  process.exit(1);
}

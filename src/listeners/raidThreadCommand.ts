/**
 * Raid Scheduler — src/listeners/raidThreadCommand.ts
 * WHAT: messageCreate listener for !추가 / !제거 / !수정 inside raid threads.
 * WHY: Members edit the schedule by talking in the thread; the starter message is rewritten in place.
 * FLOWS:
 *  - filter (bot, non-thread, prefix, roster) → per-thread queue
 *  - "처리 중" → history → extract intents → parse starter → applyIntents → render → edit starter
 *  - summary reply → command log
 * DOCS:
 *  - ThreadChannel.fetchStarterMessage: https://discord.js.org/#/docs/discord.js/main/class/ThreadChannel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type AnyThreadChannel, type Message } from "discord.js";
import { logger } from "../lib/logger.js";
import { withRetry } from "../lib/retry.js";
import { classifyError, InvalidIntentError, userFriendlyMessage } from "../lib/errors.js";
import { getRaidThread } from "../store/raidThreadStore.js";
import { logThreadCommand } from "../store/commandLogStore.js";
import type { IntentExtractor } from "../features/raid/intentExtractor.js";
import { applyIntents, type ApplyResult, type OverflowPolicy } from "../features/raid/reconcile.js";
import { isAllowed, type Roster } from "../features/raid/roster.js";
import { DEFAULT_CAPACITY } from "../features/raid/rounds.js";
import { fitToMessageLimit, parseSchedule, renderSchedule } from "../features/raid/scheduleCodec.js";
import { runSerialized } from "../features/raid/threadLock.js";
import type { CommandType, UserRef } from "../features/raid/types.js";

export const name = Events.MessageCreate;

export const HISTORY_LIMIT = 100;

const PREFIXES: ReadonlyArray<readonly [string, CommandType]> = [
  ["!추가", "add"],
  ["!제거", "remove"],
  ["!수정", "edit"],
];

// mentions in replies are display-only; nobody gets pinged by a schedule edit
const NO_PINGS = { parse: [] };

export interface ThreadCommand {
  commandType: CommandType;
  commandText: string;
}

/** "!추가 1차 딜" → { add, "1차 딜" }. Anything else → null. */
export function parseThreadCommand(content: string): ThreadCommand | null {
  const trimmed = content.trim();
  for (const [prefix, commandType] of PREFIXES) {
    if (trimmed === prefix || trimmed.startsWith(`${prefix} `) || trimmed.startsWith(`${prefix}\n`)) {
      return { commandType, commandText: trimmed.slice(prefix.length).trim() };
    }
  }
  return null;
}

export interface ThreadCommandDeps {
  extractor: Pick<IntentExtractor, "extract">;
  roster: Roster;
  overflow: OverflowPolicy;
}

export function formatChangeSummary(changes: readonly string[]): string {
  if (changes.length === 0) return "변경된 내용이 없습니다.";
  return [`${changes.length}개의 변경 사항이 적용되었습니다.`, ...changes.map((c) => `- ${c}`)].join("\n");
}

async function collectHistory(thread: AnyThreadChannel): Promise<string> {
  const fetched = await thread.messages.fetch({ limit: HISTORY_LIMIT });
  return [...fetched.values()]
    .filter((m) => !m.author.bot)
    .sort((a, b) => a.createdTimestamp - b.createdTimestamp)
    .map((m) => `${m.member?.displayName ?? m.author.displayName}: ${m.content}`)
    .join("\n");
}

function authorRef(message: Message): UserRef {
  return { name: message.member?.displayName ?? message.author.displayName, id: message.author.id };
}

/** Edit the starter message; when that keeps failing, post the schedule in the thread instead. */
async function publishSchedule(
  starter: Message,
  thread: AnyThreadChannel,
  content: string
): Promise<"edited" | "posted"> {
  try {
    await withRetry(() => starter.edit({ content, allowedMentions: NO_PINGS }), {
      maxAttempts: 3,
      label: "raid_starter_edit",
    });
    return "edited";
  } catch (err) {
    logger.warn(
      { evt: "raid_starter_edit_failed", threadId: thread.id, messageId: starter.id, err },
      "[raidThread] starter edit failed; posting schedule in thread"
    );
    await thread.send({ content, allowedMentions: NO_PINGS });
    return "posted";
  }
}

async function processCommand(
  message: Message,
  thread: AnyThreadChannel,
  command: ThreadCommand,
  deps: ThreadCommandDeps
): Promise<void> {
  const processing = await thread.send({ content: "명령어를 처리 중입니다...", allowedMentions: NO_PINGS });
  try {
    await applyThreadCommand(message, thread, processing, command, deps);
  } catch (err) {
    // leave the user a visible outcome; wrapEvent logs and reports the error
    try {
      await processing.edit({ content: userFriendlyMessage(classifyError(err)), allowedMentions: NO_PINGS });
    } catch (editErr) {
      logger.debug({ evt: "raid_processing_edit_failed", err: editErr }, "[raidThread] could not edit processing message");
    }
    throw err;
  }
}

async function applyThreadCommand(
  message: Message,
  thread: AnyThreadChannel,
  processing: Message,
  command: ThreadCommand,
  deps: ThreadCommandDeps
): Promise<void> {
  const author = authorRef(message);

  const finish = async (reply: string, log: { source: string | null; changeCount: number; error: string | null }) => {
    try {
      await processing.delete();
    } catch (err) {
      logger.debug({ evt: "raid_processing_delete_failed", err }, "[raidThread] could not delete processing message");
    }
    await message.reply({ content: reply, allowedMentions: NO_PINGS });
    logThreadCommand({
      threadId: thread.id,
      authorId: message.author.id,
      authorName: author.name,
      commandType: command.commandType,
      commandText: command.commandText,
      ...log,
    });
  };

  const starter = await thread.fetchStarterMessage();
  if (!starter) {
    await finish("스레드의 시작 메시지를 찾을 수 없습니다.", { source: null, changeCount: 0, error: "starter_missing" });
    return;
  }

  const history = await collectHistory(thread);
  const extracted = await deps.extractor.extract({
    historyText: history,
    scheduleText: starter.content,
    commandType: command.commandType,
    author,
    commandText: command.commandText,
  });
  if (!extracted.ok) {
    await finish(`명령어를 처리할 수 없습니다: ${extracted.error.message}`, {
      source: null,
      changeCount: 0,
      error: extracted.error.reason,
    });
    return;
  }

  const capacity = getRaidThread(thread.id)?.capacity ?? DEFAULT_CAPACITY;
  const data = parseSchedule(starter.content, { capacity });
  let result: ApplyResult;
  try {
    result = applyIntents(data, extracted.intents, { capacity, overflow: deps.overflow });
  } catch (err) {
    if (!(err instanceof InvalidIntentError)) throw err;
    logger.warn({ evt: "raid_invalid_intent", threadId: thread.id, err }, "[raidThread] extractor produced an invalid intent");
    await finish(`명령어를 처리할 수 없습니다: ${err.message}`, {
      source: extracted.source,
      changeCount: 0,
      error: "invalid_intent",
    });
    return;
  }

  if (result.changed) {
    const fitted = fitToMessageLimit(renderSchedule(data));
    if (fitted.truncated) {
      logger.warn({ evt: "raid_schedule_truncated", threadId: thread.id }, "[raidThread] schedule exceeded message limit");
    }
    const outcome = await publishSchedule(starter, thread, fitted.text);
    logger.info(
      {
        evt: "raid_schedule_updated",
        threadId: thread.id,
        commandType: command.commandType,
        source: extracted.source,
        changes: result.changes.length,
        outcome,
      },
      "[raidThread] schedule updated"
    );
  }

  await finish(formatChangeSummary(result.changes), {
    source: extracted.source,
    changeCount: result.changes.length,
    error: null,
  });
}

export async function handleThreadCommand(message: Message, deps: ThreadCommandDeps): Promise<void> {
  if (message.author.bot || message.webhookId) return;
  const channel = message.channel;
  if (!channel.isThread()) return;

  const command = parseThreadCommand(message.content);
  if (!command) return;

  if (!isAllowed(deps.roster, message.author.id)) {
    logger.info(
      { evt: "raid_command_denied", threadId: channel.id, userId: message.author.id },
      "[raidThread] user not on roster"
    );
    await message.reply({ content: "등록된 멤버만 일정 명령어를 사용할 수 있습니다.", allowedMentions: NO_PINGS });
    return;
  }

  await runSerialized(channel.id, () => processCommand(message, channel, command, deps));
}

export function createThreadCommandListener(deps: ThreadCommandDeps) {
  return (message: Message) => handleThreadCommand(message, deps);
}

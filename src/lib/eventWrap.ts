/**
 * Raid Scheduler — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers.
 * WHY: A failing thread command must never take the gateway connection down with it.
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches, classifies, and logs
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", (m) => handleThreadCommand(m, deps), 60_000));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { newTraceId, runWithCtx } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * Wrap an event handler with error protection and a wall-clock timeout.
 * The returned handler never rejects.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    const contextIds = extractEventContext(args);
    let timer: NodeJS.Timeout | undefined;
    try {
      await runWithCtx({ traceId: newTraceId(), kind: "event", cmd: eventName }, () =>
        Promise.race([
          Promise.resolve(handler(...args)),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
          }),
        ])
      );
    } catch (err) {
      const classified = classifyError(err);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, ...contextIds });
      }
      // never rethrow: the bot keeps running
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

function readString(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

function readObject(obj: object, key: string): object | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "object" && value !== null ? value : undefined;
}

/**
 * Pull guild/channel/author ids off whatever discord.js passed so error logs
 * can be traced back to a thread.
 */
export function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = readString(arg, "guildId");
    if (guildId) context.guildId = guildId;

    const channelId = readString(arg, "channelId");
    if (channelId) context.channelId = channelId;

    const id = readString(arg, "id");
    if (id && !context.entityId) context.entityId = id;

    const author = readObject(arg, "author") ?? readObject(arg, "user");
    const userId = author ? readString(author, "id") : undefined;
    if (userId) context.userId = userId;
  }

  return context;
}

/**
 * Raid Scheduler — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Every module logs `{ evt, ... }` objects through one instance.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Token pattern: Discord bot tokens are three base64-ish segments.
 * Key pattern: Anthropic keys and bearer headers for the game API.
 * Mention pattern: @everyone/@here leaking from thread text into logs.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const apiKeyRe = /\b(sk-ant-[A-Za-z0-9_-]{8})[A-Za-z0-9_-]+/g;
const bearerRe = /(bearer\s+)[A-Za-z0-9._-]{16,}/gi;
const mentionRe = /@(everyone|here)/gi;

let sentryImportWarned = false;

/**
 * Sanitize user-controlled or upstream text before logging.
 * Truncates at 300 chars; thread messages can be long.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(apiKeyRe, "$1[redacted]");
  sanitized = sanitized.replace(bearerRe, "$1[redacted]");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

/** Only the useful parts of an error; discord.js errors carry huge request bodies. */
function serializeError(e: unknown) {
  return {
    name: field(e, "name"),
    code: field(e, "code"),
    message: field(e, "message") ?? String(e),
    stack: field(e, "stack"),
  };
}

/**
 * LOG_LEVEL overrides "info". Pretty output under vitest and for TTY dev runs
 * with LOG_PRETTY=true; otherwise newline-delimited JSON.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  /**
   * Error-level logs that carry an Error are forwarded to Sentry, so callers
   * only need logger.error({ err }, "...").
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate = firstArg instanceof Error ? firstArg : field(firstArg, "err");

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // dynamic import: sentry.ts imports this module
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", field(importErr, "message"));
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});

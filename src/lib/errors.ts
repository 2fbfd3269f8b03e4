/**
 * Raid Scheduler — src/lib/errors.ts
 * WHAT: Discriminated union error types plus the few error classes the bot throws.
 * WHY: Lets command/event wrappers pick a recovery strategy and a user-facing message
 *      without instanceof chains scattered through the code.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, isRecoverable } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10008) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown error classes =====

/**
 * A malformed intent reached the engine (bad round index, unknown type).
 * This is a programmer error; business-rule rejections never throw.
 */
export class InvalidIntentError extends Error {
  override readonly name = "InvalidIntentError";
}

/** Intent extraction failed: upstream API error, timeout, or unusable output. */
export class ExtractionError extends Error {
  override readonly name = "ExtractionError";
  constructor(
    message: string,
    readonly reason: "api" | "timeout" | "malformed" | "limit",
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Non-2xx response from an HTTP API we call with fetch. */
export class HttpStatusError extends Error {
  override readonly name = "HttpStatusError";
  constructor(
    message: string,
    readonly status: number,
    readonly url: string
  ) {
    super(message);
  }
}

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 * `kind` is the discriminator; switch on it instead of instanceof.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 * SQLITE_BUSY/SQLITE_LOCKED are transient; constraint errors are logic bugs.
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
  sql?: string;
  table?: string;
}

/**
 * Discord API errors. Discord uses numeric codes, not HTTP status:
 * - 10008: Unknown Message (starter message deleted)
 * - 10062: Unknown Interaction (3s window expired)
 * - 50013: Missing Permissions
 * - 50001: Missing Access
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** HTTP errors from the game API or the LLM API */
export interface HttpError extends AppError {
  kind: "http";
  status: number;
  url?: string;
}

export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
  channelId?: string;
  guildId?: string;
}

/** Node.js system errors: the request never reached the server */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface ConfigError extends AppError {
  kind: "config";
  key: string;
  expected?: string;
}

export interface ExtractionFailure extends AppError {
  kind: "extraction";
  reason: ExtractionError["reason"];
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | HttpError
  | ValidationError
  | PermissionError
  | NetworkError
  | ConfigError
  | ExtractionFailure
  | UnknownError;

// ===== Error Classification =====

function prop(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Reflect.get(err, key);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

/**
 * Classify any caught error into the union. Ordered most specific first:
 * our own classes, SQLite, Discord, network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = str(prop(err, "message")) ?? String(err);
  const code = prop(err, "code");
  const name = str(prop(err, "name"));

  if (err instanceof ExtractionError) {
    return { kind: "extraction", reason: err.reason, message, cause };
  }

  if (err instanceof InvalidIntentError) {
    return { kind: "validation", field: "intent", message, cause };
  }

  if (err instanceof HttpStatusError) {
    return { kind: "http", status: err.status, url: err.url, message, cause };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    const sql = str(prop(err, "sql"));
    return {
      kind: "db_error",
      code: str(code) ?? "UNKNOWN",
      message,
      sql,
      table: extractTableFromSql(sql),
      cause,
    };
  }

  // Missing permissions / missing access come through as DiscordAPIError too,
  // but callers want them as a permission problem, not an API fault.
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: num(prop(err, "status")) ?? num(prop(err, "httpStatus")),
      method: str(prop(err, "method")),
      path: str(prop(err, "url")) ?? str(prop(err, "path")),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: str(prop(err, "hostname")) ?? str(prop(err, "host")),
      message,
      cause,
    };
  }

  // fetch() rejects with TypeError("fetch failed") and the system error as cause
  if (name === "TypeError" && message === "fetch failed") {
    const inner = prop(err, "cause");
    return {
      kind: "network",
      code: str(prop(inner, "code")) ?? "FETCH_FAILED",
      host: str(prop(inner, "hostname")),
      message,
      cause,
    };
  }

  // SDK errors (the Anthropic client's APIError) carry the response status
  const status = num(prop(err, "status"));
  if (status !== undefined && status >= 400) {
    return { kind: "http", status, url: str(prop(err, "url")), message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Worth retrying? Conservative on purpose: a false negative fails fast,
 * a false positive hammers a service that is already struggling.
 * Discord 429s are handled inside discord.js, so they never get here.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    case "http":
      return err.status === 429 || (err.status >= 500 && err.status < 600);

    case "extraction":
      return err.reason === "timeout";

    default:
      return false;
  }
}

/**
 * Sentry should mean "something is actually broken", not "Discord had a hiccup".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "validation":
    case "permission":
      return false;

    case "http":
      return err.status >= 500;

    case "extraction":
      return err.reason === "api";

    default:
      return true;
  }
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10062;
}

export function isAlreadyAcknowledged(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 40060;
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, sql: err.sql?.slice(0, 100), table: err.table };

    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "http":
      return { ...base, httpStatus: err.status, url: err.url };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "permission":
      return { ...base, neededPerms: err.needed, channelId: err.channelId, guildId: err.guildId };

    case "extraction":
      return { ...base, reason: err.reason };

    default:
      return base;
  }
}

/**
 * Message shown to members. The guild plays in Korean, so replies are Korean.
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (err.code === "SQLITE_BUSY") {
        return "데이터베이스가 잠시 사용 중입니다. 다시 시도해주세요.";
      }
      return "데이터베이스 오류가 발생했습니다.";

    case "discord_api":
      if (err.code === 10062) {
        return "상호작용이 만료되었습니다. 명령어를 다시 실행해주세요.";
      }
      if (err.code === 10008) {
        return "원본 메시지를 찾을 수 없습니다.";
      }
      return "디스코드 API 오류가 발생했습니다.";

    case "http":
      if (err.status === 429) {
        return "요청이 너무 많습니다. 잠시 후 다시 시도해주세요.";
      }
      return `외부 API 오류가 발생했습니다. (HTTP ${err.status})`;

    case "network":
      return "네트워크 오류가 발생했습니다. 잠시 후 다시 시도해주세요.";

    case "permission":
      return "메시지 수정 권한이 없습니다.";

    case "validation":
      return `잘못된 입력입니다: ${err.message}`;

    case "config":
      return `설정 오류: ${err.key} 값이 올바르지 않습니다.`;

    case "extraction":
      return err.message;

    default:
      return "알 수 없는 오류가 발생했습니다.";
  }
}

// ===== Internal Helpers =====

/** Best-effort table name for diagnostics; not a SQL parser. */
function extractTableFromSql(sql: string | undefined): string | undefined {
  if (!sql) return undefined;
  const match = sql.match(/(?:FROM|INTO|UPDATE|JOIN)\s+(\w+)/i);
  return match?.[1];
}

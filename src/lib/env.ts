/**
 * Raid Scheduler — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on a missing bot token; keep process.env access in one place.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override in production so .env wins over a stale shell; tests set vars before import
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/** Every variable is trimmed; copy-pasted .env values often carry whitespace. */
function readRaw() {
  const get = (key: string) => process.env[key]?.trim() || undefined;
  return {
    DISCORD_TOKEN: get("DISCORD_TOKEN"),
    CLIENT_ID: get("CLIENT_ID"),
    GUILD_ID: get("GUILD_ID"),
    NODE_ENV: get("NODE_ENV"),
    DB_PATH: get("DB_PATH"),
    SENTRY_DSN: get("SENTRY_DSN"),
    SENTRY_ENVIRONMENT: get("SENTRY_ENVIRONMENT"),
    SENTRY_TRACES_SAMPLE_RATE: get("SENTRY_TRACES_SAMPLE_RATE"),
    LOG_LEVEL: get("LOG_LEVEL"),
    ANTHROPIC_API_KEY: get("ANTHROPIC_API_KEY"),
    ANTHROPIC_MODEL: get("ANTHROPIC_MODEL"),
    INTENT_TIMEOUT_MS: get("INTENT_TIMEOUT_MS"),
    INTENT_CACHE_DIR: get("INTENT_CACHE_DIR"),
    INTENT_CACHE_HORIZON_DAYS: get("INTENT_CACHE_HORIZON_DAYS"),
    LOSTARK_API_KEY: get("LOSTARK_API_KEY"),
    CHARACTER_UPDATES_CHANNEL_ID: get("CHARACTER_UPDATES_CHANNEL_ID"),
    RAIDS_CONFIG: get("RAIDS_CONFIG"),
    MEMBERS_CONFIG: get("MEMBERS_CONFIG"),
    SCHEDULE_OVERFLOW: get("SCHEDULE_OVERFLOW"),
    HEALTH_PORT: get("HEALTH_PORT"),
  };
}

/**
 * Only the Discord credentials are required. Without ANTHROPIC_API_KEY thread
 * commands fall back to the local pattern parser; without LOSTARK_API_KEY
 * /character lookup and the character sync are disabled.
 */
export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  LOG_LEVEL: z.string().optional(),

  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-3-5-haiku-latest"),
  INTENT_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  INTENT_CACHE_DIR: z.string().default("data/intent-cache"),
  INTENT_CACHE_HORIZON_DAYS: z.coerce.number().int().positive().default(30),

  LOSTARK_API_KEY: z.string().optional(),
  // level-up embeds from the character sync go here; unset means log only
  CHARACTER_UPDATES_CHANNEL_ID: z.string().regex(/^\d{5,25}$/).optional(),

  RAIDS_CONFIG: z.string().default("config/raids.yaml"),
  MEMBERS_CONFIG: z.string().default("config/members.yaml"),

  // round-less adds with no free seat: "strict" leaves them out, "elastic" opens a round
  SCHEDULE_OVERFLOW: z.enum(["strict", "elastic"]).default("strict"),

  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(3002),
});

export type Env = z.infer<typeof envSchema>;

/** safeParse reports every problem at once instead of one per restart. */
export function parseEnv(raw: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }
  return parsed.data;
}

function loadEnv(): Env {
  try {
    return parseEnv(readRaw());
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

export const env = loadEnv();

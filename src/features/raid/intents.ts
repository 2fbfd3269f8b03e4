/**
 * Raid Scheduler — src/features/raid/intents.ts
 * WHAT: zod schemas that turn untrusted extractor output into Intent values.
 * WHY: LLM output is frequently almost-right. Each item is validated on its own
 *      so one bad entry doesn't sink the whole batch; round tokens like "2차"
 *      and role synonyms are normalized here, once.
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { sameUser, toUserRef } from "./identity.js";
import { normalizeRole } from "./roles.js";
import { isRoundIndex, MAX_ROUND_INDEX, singleLine } from "./rounds.js";
import type { Intent, UserRef } from "./types.js";

const ROUND_TOKEN_RE = /^\s*(\d+)\s*(?:차)?\s*$/;

/** 2, "2", "2차" → 2. Anything else, or past MAX_ROUND_INDEX → undefined. */
export function parseRoundToken(value: unknown): number | undefined {
  if (typeof value === "number") {
    return isRoundIndex(value) ? value : undefined;
  }
  if (typeof value !== "string") return undefined;
  const match = ROUND_TOKEN_RE.exec(value);
  if (!match) return undefined;
  const n = Number(match[1]);
  return isRoundIndex(n) ? n : undefined;
}

const roundInput = z.union([z.number(), z.string()]);

const requiredRound = roundInput.transform((value, ctx) => {
  const n = parseRoundToken(value);
  if (n === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid round: ${value}` });
    return z.NEVER;
  }
  return n;
});

const optionalRound = roundInput.nullish().transform((value, ctx) => {
  if (value === null || value === undefined || value === "") return undefined;
  const n = parseRoundToken(value);
  if (n === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid round: ${value}` });
    return z.NEVER;
  }
  return n;
});

const requiredRole = z.string().transform((value, ctx) => {
  const role = normalizeRole(value);
  if (!role) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown role: ${value}` });
    return z.NEVER;
  }
  return role;
});

const optionalRole = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined || value.trim() === "") return undefined;
    const role = normalizeRole(value);
    if (!role) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown role: ${value}` });
      return z.NEVER;
    }
    return role;
  });

const userField = z.string().trim().min(1);
const textField = z.string().transform(singleLine);

/** Wire shape produced by the extractor (LLM or local parser). */
export const rawIntentSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("add_participant"),
    user: userField,
    round: optionalRound,
    role: requiredRole,
  }),
  z.object({
    type: z.literal("remove_participant"),
    user: userField,
    round: optionalRound,
    role: optionalRole,
    count: z.number().int().min(1).max(10).nullish(),
  }),
  z.object({
    type: z.literal("update_schedule"),
    round: requiredRound,
    when: textField.pipe(z.string().min(1)),
  }),
  z.object({
    type: z.literal("add_round"),
    round: requiredRound,
    when: textField.default(""),
  }),
  z.object({
    type: z.literal("update_note"),
    round: requiredRound,
    note: textField,
  }),
]);

export type RawIntent = z.infer<typeof rawIntentSchema>;

const roundIndex = z.number().int().min(1).max(MAX_ROUND_INDEX);

const userRefSchema = z.object({ name: z.string(), id: z.string().optional() });

/** Canonical Intent shape, used to re-validate cached entries read from disk. */
export const intentSchema: z.ZodType<Intent> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("add_participant"),
    user: userRefSchema,
    round: roundIndex.optional(),
    role: z.enum(["support", "dealer"]),
  }),
  z.object({
    type: z.literal("remove_participant"),
    user: userRefSchema,
    round: roundIndex.optional(),
    role: z.enum(["support", "dealer"]).optional(),
    count: z.number().int().positive().optional(),
  }),
  z.object({ type: z.literal("update_schedule"), round: roundIndex, when: z.string() }),
  z.object({ type: z.literal("add_round"), round: roundIndex, when: z.string() }),
  z.object({ type: z.literal("update_note"), round: roundIndex, note: z.string() }),
]);

const SELF_TOKENS = new Set(["나", "저", "본인", "me", "self", "myself"]);

export interface IntentContext {
  /** Who issued the command; first-person references and name matches resolve to them. */
  author?: UserRef;
}

function resolveUser(token: string, ctx: IntentContext): UserRef {
  const author = ctx.author;
  if (author && SELF_TOKENS.has(token.toLowerCase())) return { ...author };
  const ref = toUserRef(token);
  if (author && sameUser(ref, author)) return { ...author };
  return ref;
}

/** Convert one validated wire item into an Intent. */
export function toIntent(raw: RawIntent, ctx: IntentContext = {}): Intent {
  switch (raw.type) {
    case "add_participant":
      return { type: raw.type, user: resolveUser(raw.user, ctx), round: raw.round, role: raw.role };
    case "remove_participant":
      return {
        type: raw.type,
        user: resolveUser(raw.user, ctx),
        round: raw.round,
        role: raw.role,
        count: raw.count ?? undefined,
      };
    case "update_schedule":
      return { type: raw.type, round: raw.round, when: raw.when };
    case "add_round":
      return { type: raw.type, round: raw.round, when: raw.when };
    case "update_note":
      return { type: raw.type, round: raw.round, note: raw.note };
  }
}

export interface ParsedIntents {
  intents: Intent[];
  /** items present but invalid */
  rejected: number;
  /** payload was not JSON or not a recognizable container */
  malformed: boolean;
}

function itemsOf(payload: unknown): unknown[] | undefined {
  if (Array.isArray(payload)) return payload;
  if (typeof payload !== "object" || payload === null) return undefined;
  for (const key of ["intents", "changes", "commands"]) {
    const value: unknown = Reflect.get(payload, key);
    if (Array.isArray(value)) return value;
  }
  return undefined;
}

/** Validate an already-decoded payload. Invalid items are dropped, not fatal. */
export function parseIntentPayload(payload: unknown, ctx: IntentContext = {}): ParsedIntents {
  const items = itemsOf(payload);
  if (!items) return { intents: [], rejected: 0, malformed: true };

  const intents: Intent[] = [];
  let rejected = 0;
  for (const item of items) {
    const result = rawIntentSchema.safeParse(item);
    if (result.success) intents.push(toIntent(result.data, ctx));
    else rejected += 1;
  }
  return { intents, rejected, malformed: false };
}

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;

/** Decode model text (optionally fenced) and validate it. */
export function parseIntentJson(text: string, ctx: IntentContext = {}): ParsedIntents {
  const fenced = FENCE_RE.exec(text);
  let body = (fenced?.[1] ?? text).trim();
  // models sometimes wrap the object in prose
  if (!body.startsWith("{") && !body.startsWith("[")) {
    const start = body.indexOf("{");
    const end = body.lastIndexOf("}");
    if (start !== -1 && end > start) body = body.slice(start, end + 1);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return { intents: [], rejected: 0, malformed: true };
  }
  return parseIntentPayload(payload, ctx);
}

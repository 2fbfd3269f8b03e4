/**
 * Raid Scheduler — src/features/raid/intentExtractor.ts
 * WHAT: Turns a thread command plus context into Intent[] via cache → LLM → local parser.
 * WHY: Members write commands loosely ("나 토요일꺼 딜로 넣어줘"). The model handles
 *      the long tail; the local parser covers the common shapes when no key is set.
 * FLOWS:
 *  - guard (≤ 10 role counts) → cache lookup → model call (timeout + retry) → validate → cache put
 *  - any failure → { ok: false, error } and the engine is never invoked
 * DOCS:
 *  - Anthropic Messages API: https://docs.anthropic.com/en/api/messages
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import Anthropic from "@anthropic-ai/sdk";
import { logger, redact } from "../../lib/logger.js";
import { ExtractionError } from "../../lib/errors.js";
import { withRetry } from "../../lib/retry.js";
import { IntentCache } from "./intentCache.js";
import { parseIntentJson } from "./intents.js";
import { countRolePatterns, MAX_INTENTS_PER_COMMAND, parseCommandLocally } from "./localParser.js";
import type { CommandType, Intent, UserRef } from "./types.js";

export interface ExtractRequest {
  /** Thread history, oldest first, one "name: text" line per message */
  historyText: string;
  /** Current schedule text from the starter message */
  scheduleText: string;
  commandType: CommandType;
  author: UserRef;
  /** Text after the command prefix */
  commandText: string;
}

export type ExtractResult =
  | { ok: true; intents: Intent[]; source: "cache" | "llm" | "fallback" }
  | { ok: false; error: ExtractionError };

/** Seam over the LLM so tests and alternate providers don't touch the SDK. */
export interface IntentModel {
  complete(system: string, prompt: string, signal: AbortSignal): Promise<string>;
}

export class AnthropicIntentModel implements IntentModel {
  constructor(
    private readonly client: Anthropic,
    private readonly model: string,
    private readonly maxTokens = 1024
  ) {}

  async complete(system: string, prompt: string, signal: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: 0,
        system,
        messages: [{ role: "user", content: prompt }],
      },
      { signal }
    );
    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") parts.push(block.text);
    }
    return parts.join("");
  }
}

const COMMAND_LABEL: Record<CommandType, string> = {
  add: "추가",
  remove: "제거",
  edit: "수정",
};

export const SYSTEM_PROMPT = `당신은 로스트아크 레이드 일정을 관리하는 어시스턴트입니다.
사용자의 명령을 아래 JSON 형식으로만 변환하세요. 설명은 쓰지 마세요.

{
  "intents": [
    { "type": "add_participant", "user": "이름 또는 <@ID>", "round": 정수 또는 null, "role": "support" 또는 "dealer" },
    { "type": "remove_participant", "user": "이름 또는 <@ID>", "round": 정수 또는 null, "role": "support" | "dealer" | null, "count": 정수 또는 null },
    { "type": "update_schedule", "round": 정수, "when": "요일 시간" },
    { "type": "add_round", "round": 정수, "when": "요일 시간 또는 빈 문자열" },
    { "type": "update_note", "round": 정수, "note": "메모" }
  ]
}

규칙:
- "서포터", "서폿", "폿"은 support, "딜러", "딜"은 dealer 입니다.
- "2딜"처럼 숫자와 역할이 붙어 있으면 같은 항목을 그 수만큼 반복합니다.
- 차수를 지정하지 않았다면 round는 null 입니다.
- 명령한 사람 본인을 가리키면 user에 명령한 사람의 이름을 그대로 씁니다.
- 한 번에 최대 ${MAX_INTENTS_PER_COMMAND}개 항목까지만 만듭니다.`;

export function buildPrompt(request: ExtractRequest): string {
  const author = request.author.id ? `${request.author.name} (<@${request.author.id}>)` : request.author.name;
  return [
    `명령 종류: ${COMMAND_LABEL[request.commandType]} (${request.commandType})`,
    `명령한 사람: ${author}`,
    `명령: ${request.commandText}`,
    "",
    "현재 일정:",
    request.scheduleText,
    "",
    "스레드 대화 (오래된 순):",
    request.historyText || "(없음)",
  ].join("\n");
}

export interface IntentExtractorDeps {
  cache: IntentCache;
  /** undefined → local parser only */
  model?: IntentModel;
  timeoutMs?: number;
  maxAttempts?: number;
}

export class IntentExtractor {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(private readonly deps: IntentExtractorDeps) {
    this.timeoutMs = deps.timeoutMs ?? 20_000;
    this.maxAttempts = deps.maxAttempts ?? 2;
  }

  async extract(request: ExtractRequest): Promise<ExtractResult> {
    const detected = countRolePatterns(request.commandText);
    if (detected > MAX_INTENTS_PER_COMMAND) {
      return {
        ok: false,
        error: new ExtractionError(
          `한 번에 최대 ${MAX_INTENTS_PER_COMMAND}개까지의 명령어만 처리할 수 있습니다. (감지된 명령어 수: ${detected}개)`,
          "limit"
        ),
      };
    }

    const key = IntentCache.keyFor({
      history: request.historyText,
      schedule: request.scheduleText,
      commandType: request.commandType,
      author: request.author.id ?? request.author.name,
      command: request.commandText,
    });

    const cached = await this.deps.cache.get(key);
    if (cached) {
      logger.debug({ evt: "intent_cache_hit", key }, "[extract] cache hit");
      return { ok: true, intents: cached, source: "cache" };
    }

    const model = this.deps.model;
    if (!model) {
      const intents = parseCommandLocally(request.commandType, request.commandText, request.author);
      await this.deps.cache.put(key, intents);
      return { ok: true, intents, source: "fallback" };
    }

    let text: string;
    try {
      text = await withRetry(() => this.callModel(model, request), {
        maxAttempts: this.maxAttempts,
        label: "intent_extract",
      });
    } catch (err) {
      if (err instanceof ExtractionError) return { ok: false, error: err };
      logger.error({ evt: "intent_extract_failed", err }, "[extract] model call failed");
      return { ok: false, error: new ExtractionError("명령어 분석 중 API 오류가 발생했습니다.", "api", { cause: err }) };
    }

    const parsed = parseIntentJson(text, { author: request.author });
    if (parsed.malformed) {
      logger.warn({ evt: "intent_extract_malformed", preview: redact(text) }, "[extract] model returned non-JSON");
      return { ok: false, error: new ExtractionError("명령어 분석 결과를 해석할 수 없습니다.", "malformed") };
    }
    if (parsed.rejected > 0) {
      logger.info({ evt: "intent_items_rejected", rejected: parsed.rejected }, "[extract] dropped invalid items");
    }

    const intents = parsed.intents.slice(0, MAX_INTENTS_PER_COMMAND);
    await this.deps.cache.put(key, intents);
    return { ok: true, intents, source: "llm" };
  }

  private async callModel(model: IntentModel, request: ExtractRequest): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await model.complete(SYSTEM_PROMPT, buildPrompt(request), controller.signal);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ExtractionError("명령어 분석 시간이 초과되었습니다.", "timeout", { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}

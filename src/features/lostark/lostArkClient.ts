/**
 * Raid Scheduler — src/features/lostark/lostArkClient.ts
 * WHAT: Minimal Lost Ark Open API client: account siblings for a character, item-level filtering.
 * WHY: /character lookup answers "which of my characters can go to this raid?" without leaving Discord.
 * FLOWS:
 *  - fetchSiblings(name) → GET /characters/{name}/siblings → zod → Character[]
 *  - 429/5xx/network → withRetry; other non-2xx → HttpStatusError
 * DOCS:
 *  - Lost Ark Open API: https://developer-lostark.game.onstove.com/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { HttpStatusError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { withRetry } from "../../lib/retry.js";

export const LOSTARK_API_BASE = "https://developer-lostark.game.onstove.com";

const characterSchema = z.object({
  ServerName: z.string(),
  CharacterName: z.string(),
  CharacterLevel: z.number().optional(),
  CharacterClassName: z.string(),
  ItemAvgLevel: z.string().optional(),
  ItemMaxLevel: z.string(),
});

// unknown characters come back as a literal null
const siblingsSchema = z.array(characterSchema).nullable();

export type LostArkCharacter = z.infer<typeof characterSchema>;

export interface LostArkClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  maxAttempts?: number;
}

/** "1,620.83" → 1620.83; unparseable → undefined */
export function parseItemLevel(value: string): number | undefined {
  const n = Number.parseFloat(value.replace(/,/g, ""));
  return Number.isFinite(n) ? n : undefined;
}

export interface LeveledCharacter extends LostArkCharacter {
  itemLevel: number;
}

/** Characters within [min, max), highest item level first. */
export function filterByItemLevel(
  characters: readonly LostArkCharacter[],
  min: number,
  max?: number | null
): LeveledCharacter[] {
  const result: LeveledCharacter[] = [];
  for (const character of characters) {
    const itemLevel = parseItemLevel(character.ItemMaxLevel);
    if (itemLevel === undefined) {
      logger.warn(
        { evt: "lostark_bad_item_level", character: character.CharacterName, value: character.ItemMaxLevel },
        "[lostark] unparseable item level"
      );
      continue;
    }
    if (itemLevel < min) continue;
    if (max !== undefined && max !== null && itemLevel >= max) continue;
    result.push({ ...character, itemLevel });
  }
  return result.sort((a, b) => b.itemLevel - a.itemLevel);
}

export class LostArkClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly maxAttempts: number;

  constructor(private readonly options: LostArkClientOptions) {
    this.baseUrl = options.baseUrl ?? LOSTARK_API_BASE;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  async fetchSiblings(characterName: string): Promise<LostArkCharacter[]> {
    const url = `${this.baseUrl}/characters/${encodeURIComponent(characterName.trim())}/siblings`;
    const body = await withRetry(() => this.getJson(url), {
      maxAttempts: this.maxAttempts,
      label: "lostark_siblings",
    });
    const parsed = siblingsSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ evt: "lostark_bad_payload", issues: parsed.error.issues.length }, "[lostark] unexpected payload");
      throw new Error("Lost Ark API returned an unexpected payload");
    }
    return parsed.data ?? [];
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: {
        accept: "application/json",
        authorization: `bearer ${this.options.apiKey}`,
      },
    });
    if (!response.ok) {
      throw new HttpStatusError(`Lost Ark API responded ${response.status}`, response.status, url);
    }
    return response.json();
  }
}

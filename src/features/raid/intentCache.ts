/**
 * Raid Scheduler — src/features/raid/intentCache.ts
 * WHAT: Content-addressed cache of extracted intents with pluggable storage.
 * WHY: The same thread history + schedule + command always yields the same
 *      extraction; re-asking the model costs money and latency. No invalidation
 *      beyond the age sweep: the key already covers every input.
 * FLOWS:
 *  - keyFor(parts) → sha256 hex
 *  - get/put/evict → backend
 *  - sweep(maxAgeMs) → drop entries older than the horizon (scheduler, every 6h)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { intentSchema } from "./intents.js";
import type { CommandType, Intent } from "./types.js";

export const DEFAULT_CACHE_HORIZON_MS = 30 * 24 * 60 * 60 * 1000; // 30 days

export interface CacheEntry {
  createdAt: number;
  intents: Intent[];
}

export interface CacheBackend {
  read(key: string): Promise<CacheEntry | undefined>;
  write(key: string, entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
}

export interface CacheKeyParts {
  history: string;
  schedule: string;
  commandType: CommandType;
  author: string;
  command: string;
}

export interface SweepStats {
  total: number;
  deleted: number;
  kept: number;
}

const entrySchema = z.object({
  createdAt: z.number(),
  intents: z.array(intentSchema),
});

export class MemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<string, CacheEntry>();

  async read(key: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(key);
    return entry ? { createdAt: entry.createdAt, intents: structuredClone(entry.intents) } : undefined;
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, { createdAt: entry.createdAt, intents: structuredClone(entry.intents) });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.entries.keys()];
  }
}

const KEY_RE = /^[a-f0-9]{64}$/;

/** One `{key}.json` per entry under `dir`. */
export class FileCacheBackend implements CacheBackend {
  constructor(private readonly dir: string) {}

  private fileFor(key: string): string {
    if (!KEY_RE.test(key)) throw new Error(`invalid cache key: ${key}`);
    return path.join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(key), "utf8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      logger.warn({ evt: "intent_cache_corrupt", key, err }, "[intentCache] unreadable cache file");
      return undefined;
    }
    const parsed = entrySchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn({ evt: "intent_cache_corrupt", key }, "[intentCache] cache file failed validation");
      return undefined;
    }
    return parsed.data;
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.fileFor(key), JSON.stringify(entry, null, 2), "utf8");
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.fileFor(key));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async keys(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names
      .filter((n) => n.endsWith(".json"))
      .map((n) => n.slice(0, -".json".length))
      .filter((k) => KEY_RE.test(k));
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && Reflect.get(err, "code") === "ENOENT";
}

export class IntentCache {
  private readonly now: () => number;

  constructor(
    private readonly backend: CacheBackend,
    options: { now?: () => number } = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Field order is fixed so equal inputs always hash the same. */
  static keyFor(parts: CacheKeyParts): string {
    const canonical = JSON.stringify([parts.history, parts.schedule, parts.commandType, parts.author, parts.command]);
    return createHash("sha256").update(canonical, "utf8").digest("hex");
  }

  async get(key: string): Promise<Intent[] | undefined> {
    const entry = await this.backend.read(key);
    return entry?.intents;
  }

  async put(key: string, intents: Intent[]): Promise<void> {
    await this.backend.write(key, { createdAt: this.now(), intents });
  }

  async evict(key: string): Promise<boolean> {
    return this.backend.delete(key);
  }

  async sweep(maxAgeMs: number = DEFAULT_CACHE_HORIZON_MS): Promise<SweepStats> {
    const stats: SweepStats = { total: 0, deleted: 0, kept: 0 };
    const cutoff = this.now() - maxAgeMs;
    for (const key of await this.backend.keys()) {
      stats.total += 1;
      const entry = await this.backend.read(key);
      // unreadable entries are dropped along with expired ones
      if (!entry || entry.createdAt < cutoff) {
        await this.backend.delete(key);
        stats.deleted += 1;
      } else {
        stats.kept += 1;
      }
    }
    return stats;
  }
}

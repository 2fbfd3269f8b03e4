/**
 * Raid Scheduler — tests/features/raid/intents.test.ts
 * WHAT: Validation of extractor output into Intent values.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  intentSchema,
  parseIntentJson,
  parseIntentPayload,
  parseRoundToken,
} from "../../../src/features/raid/intents.js";

describe("parseRoundToken", () => {
  it.each([
    [2, 2],
    ["2", 2],
    ["2차", 2],
    [" 3 차 ", 3],
  ])("reads %j as %i", (input, expected) => {
    expect(parseRoundToken(input)).toBe(expected);
  });

  it.each([0, -1, 1.5, 1000, "1000차", "99999999999999999999999차", 1e21, "0차", "abc", null, undefined])(
    "rejects %j",
    (input) => {
      expect(parseRoundToken(input)).toBeUndefined();
    }
  );
});

describe("parseIntentJson", () => {
  it("reads a fenced object and normalizes round and role tokens", () => {
    const text = '```json\n{"intents":[{"type":"add_participant","user":"Alice","round":"2차","role":"딜"}]}\n```';

    expect(parseIntentJson(text)).toEqual({
      intents: [{ type: "add_participant", user: { name: "Alice" }, round: 2, role: "dealer" }],
      rejected: 0,
      malformed: false,
    });
  });

  it("finds the object inside surrounding prose", () => {
    expect(parseIntentJson('Here you go: {"intents": []} done')).toEqual({
      intents: [],
      rejected: 0,
      malformed: false,
    });
  });

  it("flags text that is not JSON", () => {
    expect(parseIntentJson("sorry, I cannot help")).toEqual({ intents: [], rejected: 0, malformed: true });
  });

  it("drops invalid items and keeps the rest", () => {
    const result = parseIntentJson(
      JSON.stringify([
        { type: "add_participant", user: "Bob", role: "tank" },
        { type: "update_schedule", round: 1, when: "" },
        { type: "add_round", round: "3차" },
      ])
    );

    expect(result.rejected).toBe(2);
    expect(result.intents).toEqual([{ type: "add_round", round: 3, when: "" }]);
  });

  it("folds multi-line when and note values onto one line", () => {
    const result = parseIntentJson(
      JSON.stringify([
        { type: "update_note", round: 1, note: "ok\n  - 딜러(7/6): A, B" },
        { type: "update_schedule", round: 1, when: "토\r\n21시 " },
      ])
    );

    expect(result.intents).toEqual([
      { type: "update_note", round: 1, note: "ok - 딜러(7/6): A, B" },
      { type: "update_schedule", round: 1, when: "토 21시" },
    ]);
  });
});

describe("parseIntentPayload", () => {
  const author = { name: "Eve", id: "10005" };

  it("resolves first-person and matching names to the author", () => {
    const result = parseIntentPayload(
      {
        changes: [
          { type: "add_participant", user: "나", role: "폿" },
          { type: "remove_participant", user: "eve", round: null, role: null, count: null },
        ],
      },
      { author }
    );

    expect(result.intents).toEqual([
      { type: "add_participant", user: author, role: "support" },
      { type: "remove_participant", user: author },
    ]);
  });

  it("keeps other users as named, with mention ids extracted", () => {
    const result = parseIntentPayload([{ type: "remove_participant", user: "<@22222>", role: "dps" }], { author });

    expect(result.intents).toEqual([
      { type: "remove_participant", user: { name: "<@22222>", id: "22222" }, role: "dealer" },
    ]);
  });

  it("treats an unrecognized container as malformed", () => {
    expect(parseIntentPayload({ foo: [] }).malformed).toBe(true);
    expect(parseIntentPayload("text").malformed).toBe(true);
  });
});

describe("intentSchema", () => {
  it("accepts canonical intents and rejects wire-format ones", () => {
    expect(intentSchema.safeParse({ type: "update_note", round: 1, note: "x" }).success).toBe(true);
    expect(intentSchema.safeParse({ type: "add_participant", user: "Alice", role: "딜" }).success).toBe(false);
  });

  it("bounds cached round numbers", () => {
    expect(intentSchema.safeParse({ type: "update_note", round: 999, note: "x" }).success).toBe(true);
    expect(intentSchema.safeParse({ type: "update_note", round: 1000, note: "x" }).success).toBe(false);
    expect(intentSchema.safeParse({ type: "add_round", round: 1e21, when: "" }).success).toBe(false);
  });
});

/**
 * Raid Scheduler — src/features/raid/roles.ts
 * WHAT: Maps free-form role tokens onto the two-value Role enum.
 * WHY: Members write 서포터/서폿/폿/sup or 딜러/딜/dps interchangeably.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Role } from "./types.js";

const SUPPORT_TOKENS = new Set(["서포터", "서폿", "폿", "support", "supporter", "sup"]);
const DEALER_TOKENS = new Set(["딜러", "딜", "dps", "dealer", "damage"]);

export const ROLE_LABEL: Record<Role, string> = {
  support: "서포터",
  dealer: "딜러",
};

export function normalizeRole(token: string | null | undefined): Role | undefined {
  if (!token) return undefined;
  const key = token.trim().toLowerCase();
  if (SUPPORT_TOKENS.has(key)) return "support";
  if (DEALER_TOKENS.has(key)) return "dealer";
  return undefined;
}

export function isRole(value: unknown): value is Role {
  return value === "support" || value === "dealer";
}

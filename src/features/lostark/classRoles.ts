/**
 * Raid Scheduler — src/features/lostark/classRoles.ts
 * WHAT: Which party role a Lost Ark class fills.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Role } from "../raid/types.js";

/** Every other class plays as a dealer. */
const SUPPORT_CLASSES: ReadonlySet<string> = new Set(["바드", "홀리나이트", "도화가"]);

export function classRole(className: string): Role {
  return SUPPORT_CLASSES.has(className.trim()) ? "support" : "dealer";
}

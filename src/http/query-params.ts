// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/http/query-params`
 * Purpose: Lenient parsing of the `since` and `level` query parameters.
 * Scope: Pure parsing. Invalid input falls back to "no filter", never an error response.
 * Invariants: since is finite and >= 0; level is a LogLevel or undefined.
 * Side-effects: none
 * @public
 */

import { isLogLevel, type LogLevel } from "../core/model.js";

const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  WARNING: "WARN",
  CRITICAL: "ERROR",
};

export function parseSince(value: string | null | undefined): number {
  if (value === null || value === undefined || value.trim() === "") return 0;
  const since = Number(value);
  return Number.isFinite(since) && since >= 0 ? since : 0;
}

export function parseLevel(
  value: string | null | undefined
): LogLevel | undefined {
  if (!value) return undefined;
  const upper = value.toUpperCase();
  if (isLogLevel(upper)) return upper;
  return LEVEL_ALIASES[upper];
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/rules`
 * Purpose: Fixed classification policy for request outcomes.
 * Scope: Pure functions mapping status codes and errors to log levels and attribute values. Does not log.
 * Invariants: < 400 → INFO, 400-499 → WARN, >= 500 → ERROR. Cutoffs are not configurable.
 * Side-effects: none
 * @public
 */

import type { LogLevel } from "./model.js";

/** Status reported for a handler that threw without an adapter-specific mapping. */
export const UNHANDLED_ERROR_STATUS = 500;

export function levelForStatus(status: number): LogLevel {
  if (status >= 500) return "ERROR";
  if (status >= 400) return "WARN";
  return "INFO";
}

/**
 * Render an unknown thrown value for the `exception` attribute.
 * Errors become "Name: message"; anything else is stringified.
 */
export function describeException(error: unknown): {
  exception: string;
  exception_type: string;
} {
  if (error instanceof Error) {
    return {
      exception: error.message ? `${error.name}: ${error.message}` : error.name,
      exception_type: error.name,
    };
  }
  return { exception: String(error), exception_type: typeof error };
}

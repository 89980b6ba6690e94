// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/adapters/server/time/system`
 * Purpose: System clock implementation for real-world time access
 * Scope: Wall clock via Date.now, monotonic via performance.now
 * Invariants: monotonic() is unaffected by wall-clock adjustments
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port
 * @internal
 */

import type { Clock } from "../../../ports/index.js";

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  monotonic(): number {
    return performance.now();
  }
}

export const systemClock: Clock = new SystemClock();

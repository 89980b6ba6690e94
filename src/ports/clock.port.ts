// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/ports/clock.port`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Wall-clock and monotonic readings. Does not handle timezone conversion or formatting.
 * Invariants: now() is epoch milliseconds; monotonic() never goes backwards and is only meaningful as a difference.
 * Side-effects: none (interface only)
 * Links: Implemented by SystemClock; FakeClock in tests.
 * @public
 */

export interface Clock {
  /** Wall clock, epoch milliseconds */
  now(): number;
  /** Monotonic milliseconds for measuring durations */
  monotonic(): number;
}

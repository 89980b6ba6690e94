// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Test fake barrel.
 * Scope: Re-exports fake implementations for testing. Does NOT export real implementations.
 * Invariants: Named exports only
 * Side-effects: none
 * Notes: Import fakes from here to replace time, storage and diagnostics in unit tests.
 * @public
 */

export {
  type CapturedLine,
  type CapturingLogger,
  makeCapturingLogger,
} from "./capture-logger.js";
export { FAKE_EPOCH_MS, FakeClock } from "./fake-clock.js";
export {
  FailingLogStorage,
  FailingMetricsStorage,
  HangingLogStorage,
  HangingMetricsStorage,
} from "./storage.js";

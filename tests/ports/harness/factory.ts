// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/ports/harness/factory`
 * Purpose: Shared harness for storage port contract suites.
 * Scope: Port testing infrastructure only. Does NOT contain actual test cases.
 * Invariants: dispose runs every registered cleanup in order.
 * Side-effects: none
 * Links: tests/ports/harness/
 * @internal
 */

import { FakeClock } from "../../_fakes/index.js";

export interface TestHarness {
  clock: FakeClock;
  cleanup: (() => Promise<void>)[];
}

export async function makeHarness(): Promise<TestHarness> {
  return { clock: new FakeClock(), cleanup: [] };
}

export async function dispose(harness: TestHarness): Promise<void> {
  for (const cleanup of harness.cleanup) {
    await cleanup();
  }
}

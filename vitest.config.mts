// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for unit and port contract tests.
 * Scope: Node environment, no infrastructure. Fakes and fixtures are helpers, not suites.
 * Invariants: No network or sockets in any suite.
 * Side-effects: none
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "tests/_fakes/**", "tests/ports/harness/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});

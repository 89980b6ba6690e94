// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/metrics-storage.port`
 * Purpose: Runs the metrics storage contract against the sample stores and the prom-client adapter.
 * Scope: Port compliance observed through the Prometheus exposition.
 * Side-effects: none
 * Links: src/ports/metrics-storage.port.ts, tests/ports/harness/metrics-storage.port.harness.ts
 * @public
 */

import { describe } from "vitest";

import {
  InMemoryMetricsStorage,
  PrometheusMetricsStorage,
  RingBufferMetricsStorage,
} from "../../src/adapters/server/index.js";
import { registerMetricsStoragePortContract } from "./harness/metrics-storage.port.harness.js";

describe("InMemoryMetricsStorage", () => {
  registerMetricsStoragePortContract(async (h) => new InMemoryMetricsStorage(h.clock));
});

describe("RingBufferMetricsStorage", () => {
  registerMetricsStoragePortContract(async (h) => new RingBufferMetricsStorage(1000, h.clock));
});

describe("PrometheusMetricsStorage", () => {
  registerMetricsStoragePortContract(async () => new PrometheusMetricsStorage());
});

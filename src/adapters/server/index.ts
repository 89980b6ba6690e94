// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for container assembly
 * @public
 */

export {
  InMemoryLogStorage,
  InMemoryMetricsStorage,
  SampleMetricsStorage,
  selectLogs,
  selectSamples,
} from "./storage/in-memory.adapter.js";
export {
  PrometheusMetricsStorage,
  type PrometheusMetricsStorageOptions,
} from "./storage/prometheus.adapter.js";
export {
  RingBuffer,
  RingBufferLogStorage,
  RingBufferMetricsStorage,
} from "./storage/ring-buffer.adapter.js";
export { SystemClock, systemClock } from "./time/system.adapter.js";

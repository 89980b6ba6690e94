// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/ports/metrics-storage.port`
 * Purpose: Port interfaces for recording, reading and exposing metric samples.
 * Scope: Write side (MetricsStoragePort), raw sample reads (MetricsReaderPort) and Prometheus text
 *        exposition (MetricsExpositionPort). Does not implement aggregation.
 * Invariants:
 *   - Safe for concurrent invocation; aggregation, if any, belongs to the adapter
 *   - Histogram buckets are passed through, never chosen by the adapter
 * Side-effects: none (interface only)
 * Notes: Adapters may implement any subset; the prom-client adapter has no raw sample reads.
 * Links: Implemented by in-memory, ring-buffer and prom-client adapters.
 * @public
 */

import type { LabelSet, MetricSample } from "../core/model.js";

export interface MetricsStoragePort {
  incrementCounter(name: string, labels: LabelSet, value: number): Promise<void>;
  observeHistogram(
    name: string,
    labels: LabelSet,
    value: number,
    buckets: readonly number[]
  ): Promise<void>;
  setGauge(name: string, labels: LabelSet, value: number): Promise<void>;
}

export interface MetricsQuery {
  /** Unix seconds; only samples strictly newer are returned. Default 0. */
  since?: number;
}

export interface MetricsReaderPort {
  read(query?: MetricsQuery): Promise<readonly MetricSample[]>;
}

export interface MetricsExpositionPort {
  /** Content-Type of render() output */
  readonly contentType: string;
  render(): Promise<string>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/metric-recorder`
 * Purpose: Thin write facade over MetricsStoragePort.
 * Scope: Copies label records and applies the fixed histogram buckets. Does not aggregate or check recordMetrics.
 * Invariants: Every histogram observation carries DEFAULT_HISTOGRAM_BUCKETS, whatever the metric name.
 * Side-effects: IO (via the storage port)
 * @public
 */

import { DEFAULT_HISTOGRAM_BUCKETS, type LabelSet } from "../core/model.js";
import type { MetricsStoragePort } from "../ports/index.js";

export class MetricRecorder {
  constructor(private readonly storage: MetricsStoragePort) {}

  incrementCounter(
    name: string,
    labels: Readonly<LabelSet>,
    value = 1
  ): Promise<void> {
    return this.storage.incrementCounter(name, { ...labels }, value);
  }

  observeHistogram(
    name: string,
    labels: Readonly<LabelSet>,
    value: number
  ): Promise<void> {
    return this.storage.observeHistogram(
      name,
      { ...labels },
      value,
      DEFAULT_HISTOGRAM_BUCKETS
    );
  }

  setGauge(name: string, labels: Readonly<LabelSet>, value: number): Promise<void> {
    return this.storage.setGauge(name, { ...labels }, value);
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/adapters/server/storage/in-memory`
 * Purpose: Unbounded in-memory log and metric storage.
 * Scope: Implements LogStoragePort, MetricsStoragePort, MetricsReaderPort and MetricsExpositionPort over arrays.
 *        Does not persist or evict.
 * Invariants: Writes are synchronous appends behind a Promise; reads return copies sorted by timestamp.
 * Side-effects: none (process memory only)
 * Notes: Suited to tests and low-volume services. Use RingBufferLogStorage for bounded memory.
 * Links: Implements ports/log-storage.port, ports/metrics-storage.port
 * @public
 */

import { counter, gauge, histogram } from "../../../core/entries.js";
import {
  PrometheusAccumulator,
  PROMETHEUS_CONTENT_TYPE,
} from "../../../core/encoding/index.js";
import type { LabelSet, LogEntry, MetricSample } from "../../../core/model.js";
import type {
  Clock,
  LogQuery,
  LogStoragePort,
  MetricsExpositionPort,
  MetricsQuery,
  MetricsReaderPort,
  MetricsStoragePort,
} from "../../../ports/index.js";
import { systemClock } from "../time/system.adapter.js";

export function selectLogs(
  entries: Iterable<LogEntry>,
  query: LogQuery = {}
): LogEntry[] {
  const since = query.since ?? 0;
  const selected: LogEntry[] = [];
  for (const entry of entries) {
    if (entry.timestamp <= since) continue;
    if (query.level && entry.level !== query.level) continue;
    selected.push(entry);
  }
  // Array.prototype.sort is stable: equal timestamps keep write order
  return selected.sort((a, b) => a.timestamp - b.timestamp);
}

export function selectSamples(
  samples: Iterable<MetricSample>,
  query: MetricsQuery = {}
): MetricSample[] {
  const since = query.since ?? 0;
  const selected: MetricSample[] = [];
  for (const sample of samples) {
    if (sample.timestamp > since) selected.push(sample);
  }
  return selected;
}

export class InMemoryLogStorage implements LogStoragePort {
  private readonly entries: LogEntry[] = [];

  async write(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }

  async read(query?: LogQuery): Promise<readonly LogEntry[]> {
    return selectLogs(this.entries, query);
  }
}

/**
 * Sample-building base shared by the in-memory and ring buffer metric stores.
 * Subclasses decide where raw samples live; the exposition reads running totals,
 * so evicting raw samples never makes a counter or histogram go backwards.
 */
export abstract class SampleMetricsStorage
  implements MetricsStoragePort, MetricsReaderPort, MetricsExpositionPort
{
  readonly contentType = PROMETHEUS_CONTENT_TYPE;
  private readonly totals = new PrometheusAccumulator();

  constructor(protected readonly clock: Clock = systemClock) {}

  protected abstract append(sample: MetricSample): void;
  protected abstract samples(): Iterable<MetricSample>;

  private record(sample: MetricSample): void {
    this.totals.add(sample);
    this.append(sample);
  }

  private timestamp(): number {
    return this.clock.now() / 1000;
  }

  async incrementCounter(
    name: string,
    labels: LabelSet,
    value: number
  ): Promise<void> {
    this.record(counter(name, value, labels, this.timestamp()));
  }

  async observeHistogram(
    name: string,
    labels: LabelSet,
    value: number,
    buckets: readonly number[]
  ): Promise<void> {
    this.record({
      ...histogram(name, value, labels, this.timestamp()),
      buckets,
    });
  }

  async setGauge(name: string, labels: LabelSet, value: number): Promise<void> {
    this.record(gauge(name, value, labels, this.timestamp()));
  }

  async read(query?: MetricsQuery): Promise<readonly MetricSample[]> {
    return selectSamples(this.samples(), query);
  }

  async render(): Promise<string> {
    return this.totals.render();
  }
}

export class InMemoryMetricsStorage extends SampleMetricsStorage {
  private readonly stored: MetricSample[] = [];

  protected append(sample: MetricSample): void {
    this.stored.push(sample);
  }

  protected samples(): Iterable<MetricSample> {
    return this.stored;
  }
}

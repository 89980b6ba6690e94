// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/adapters/server/storage/prometheus`
 * Purpose: MetricsStoragePort backed by a prom-client Registry.
 * Scope: Aggregates samples into prom-client counters, gauges and histograms and renders the registry.
 *        Does not keep raw samples (no MetricsReaderPort).
 * Invariants:
 *   - One metric per name; label names are fixed by the first write
 *   - A write with different label names or a different kind rejects with StorageWriteError
 *   - +Inf is dropped from bucket lists (prom-client always appends it)
 * Side-effects: global only when `registry` is omitted and `collectDefaultMetrics` is set (process gauges)
 * Links: Implements ports/metrics-storage.port; serves /metrics/prometheus.
 * @public
 */

import {
  Counter,
  collectDefaultMetrics,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";

import { StorageWriteError } from "../../../core/errors.js";
import type { LabelSet, MetricKind } from "../../../core/model.js";
import type {
  MetricsExpositionPort,
  MetricsStoragePort,
} from "../../../ports/index.js";

export interface PrometheusMetricsStorageOptions {
  /** Defaults to a fresh Registry owned by this adapter */
  registry?: Registry;
  /** Prepended to every metric name, e.g. `myapp_` */
  prefix?: string;
  /** Register prom-client's process metrics on the registry */
  collectDefaultMetrics?: boolean;
}

interface MetricShape {
  readonly kind: MetricKind;
  readonly labelKey: string;
}

const TARGET = "prometheus";

function labelNamesOf(labels: LabelSet): string[] {
  return Object.keys(labels).sort();
}

export class PrometheusMetricsStorage
  implements MetricsStoragePort, MetricsExpositionPort
{
  readonly registry: Registry;
  private readonly prefix: string;
  private readonly shapes = new Map<string, MetricShape>();
  private readonly counters = new Map<string, Counter<string>>();
  private readonly histograms = new Map<string, Histogram<string>>();
  private readonly gauges = new Map<string, Gauge<string>>();

  constructor(options: PrometheusMetricsStorageOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.prefix = options.prefix ?? "";
    if (options.collectDefaultMetrics) {
      collectDefaultMetrics({
        register: this.registry,
        prefix: this.prefix,
      });
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async incrementCounter(
    name: string,
    labels: LabelSet,
    value: number
  ): Promise<void> {
    this.checkShape(name, "counter", labels);
    const metric = getOrCreate(this.counters, name, () =>
      guard(
        () =>
          new Counter({
            name: this.prefix + name,
            help: `Counter ${name}`,
            labelNames: labelNamesOf(labels),
            registers: [this.registry],
          })
      )
    );
    this.commitShape(name, "counter", labels);
    guard(() => metric.inc(labels, value));
  }

  async observeHistogram(
    name: string,
    labels: LabelSet,
    value: number,
    buckets: readonly number[]
  ): Promise<void> {
    this.checkShape(name, "histogram", labels);
    const metric = getOrCreate(this.histograms, name, () =>
      guard(
        () =>
          new Histogram({
            name: this.prefix + name,
            help: `Histogram ${name}`,
            labelNames: labelNamesOf(labels),
            buckets: buckets.filter((b) => Number.isFinite(b)),
            registers: [this.registry],
          })
      )
    );
    this.commitShape(name, "histogram", labels);
    guard(() => metric.observe(labels, value));
  }

  async setGauge(name: string, labels: LabelSet, value: number): Promise<void> {
    this.checkShape(name, "gauge", labels);
    const metric = getOrCreate(this.gauges, name, () =>
      guard(
        () =>
          new Gauge({
            name: this.prefix + name,
            help: `Gauge ${name}`,
            labelNames: labelNamesOf(labels),
            registers: [this.registry],
          })
      )
    );
    this.commitShape(name, "gauge", labels);
    guard(() => metric.set(labels, value));
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }

  private checkShape(name: string, kind: MetricKind, labels: LabelSet): void {
    const shape = this.shapes.get(name);
    if (!shape) return;
    if (shape.kind !== kind) {
      throw new StorageWriteError(
        TARGET,
        new Error(`${name} is registered as ${shape.kind}, not ${kind}`)
      );
    }
    const labelKey = labelNamesOf(labels).join(",");
    if (shape.labelKey !== labelKey) {
      throw new StorageWriteError(
        TARGET,
        new Error(
          `label names for ${name} are [${shape.labelKey}], got [${labelKey}]`
        )
      );
    }
  }

  private commitShape(name: string, kind: MetricKind, labels: LabelSet): void {
    if (this.shapes.has(name)) return;
    this.shapes.set(name, { kind, labelKey: labelNamesOf(labels).join(",") });
  }
}

function getOrCreate<T>(cache: Map<string, T>, name: string, create: () => T): T {
  const existing = cache.get(name);
  if (existing !== undefined) return existing;
  const created = create();
  cache.set(name, created);
  return created;
}

/** prom-client throws synchronously on bad names and label sets. */
function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (cause) {
    throw new StorageWriteError(TARGET, cause);
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/encoding/prometheus`
 * Purpose: Prometheus text exposition (0.0.4) for raw stored samples.
 * Scope: Aggregates samples per series. encodePrometheus is stateless; PrometheusAccumulator keeps running totals.
 * Invariants:
 *   - Counters are summed, gauges report the last written value
 *   - Histograms render cumulative `_bucket{le=...}`, `_sum` and `_count`
 *   - A family's kind is taken from its first sample; samples of another kind under that name are skipped
 *   - Label values escape backslash, double quote and newline
 * Side-effects: none
 * Notes: The prom-client adapter renders through its own registry instead.
 * @public
 */

import type { LabelSet, MetricKind, MetricSample } from "../model.js";

export const PROMETHEUS_CONTENT_TYPE =
  "text/plain; version=0.0.4; charset=utf-8";

interface SeriesState {
  labels: LabelSet;
  /** Counter total, last gauge value, or histogram sum */
  value: number;
  count: number;
  bounds: readonly number[];
  bucketCounts: number[];
}

interface FamilyState {
  kind: MetricKind;
  series: Map<string, SeriesState>;
}

function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n");
}

export function formatSampleValue(value: number): string {
  if (value === Number.POSITIVE_INFINITY) return "+Inf";
  if (value === Number.NEGATIVE_INFINITY) return "-Inf";
  if (Number.isNaN(value)) return "NaN";
  return String(value);
}

function renderLabels(labels: LabelSet, extra?: [string, string]): string {
  const pairs = Object.entries(labels);
  if (extra) pairs.push(extra);
  if (pairs.length === 0) return "";
  return `{${pairs
    .map(([key, value]) => `${key}="${escapeLabelValue(value)}"`)
    .join(",")}}`;
}

function seriesKey(labels: LabelSet): string {
  return JSON.stringify(
    Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
}

function finiteBounds(sample: MetricSample): readonly number[] {
  return sample.kind === "histogram"
    ? sample.buckets.filter((b) => Number.isFinite(b))
    : [];
}

/**
 * Running per-series state for the text exposition.
 * Totals only grow, so a store can evict raw samples without counters going backwards.
 */
export class PrometheusAccumulator {
  private readonly families = new Map<string, FamilyState>();

  add(sample: MetricSample): void {
    let family = this.families.get(sample.name);
    if (!family) {
      family = { kind: sample.kind, series: new Map() };
      this.families.set(sample.name, family);
    }
    if (family.kind !== sample.kind) return;

    const key = seriesKey(sample.labels);
    let series = family.series.get(key);
    if (!series) {
      const bounds = finiteBounds(sample);
      series = {
        labels: sample.labels,
        value: 0,
        count: 0,
        bounds,
        bucketCounts: bounds.map(() => 0),
      };
      family.series.set(key, series);
    }

    series.count++;
    switch (family.kind) {
      case "counter":
        series.value += sample.value;
        break;
      case "gauge":
        series.value = sample.value;
        break;
      case "histogram":
        series.value += sample.value;
        for (let i = 0; i < series.bounds.length; i++) {
          const bound = series.bounds[i];
          if (bound !== undefined && sample.value <= bound) {
            series.bucketCounts[i] = (series.bucketCounts[i] ?? 0) + 1;
          }
        }
        break;
    }
  }

  render(): string {
    const lines: string[] = [];
    for (const [name, family] of this.families) {
      lines.push(`# TYPE ${name} ${family.kind}`);
      for (const series of family.series.values()) {
        if (family.kind === "histogram") {
          lines.push(...renderHistogram(name, series));
        } else {
          lines.push(
            `${name}${renderLabels(series.labels)} ${formatSampleValue(series.value)}`
          );
        }
      }
    }
    return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
  }
}

function renderHistogram(name: string, series: SeriesState): string[] {
  const lines = series.bounds.map(
    (bound, i) =>
      `${name}_bucket${renderLabels(series.labels, ["le", formatSampleValue(bound)])} ${series.bucketCounts[i] ?? 0}`
  );
  lines.push(
    `${name}_bucket${renderLabels(series.labels, ["le", "+Inf"])} ${series.count}`
  );
  lines.push(
    `${name}_sum${renderLabels(series.labels)} ${formatSampleValue(series.value)}`
  );
  lines.push(`${name}_count${renderLabels(series.labels)} ${series.count}`);
  return lines;
}

export function encodePrometheus(samples: Iterable<MetricSample>): string {
  const accumulator = new PrometheusAccumulator();
  for (const sample of samples) accumulator.add(sample);
  return accumulator.render();
}

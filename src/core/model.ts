// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/model`
 * Purpose: Domain types for observability records - log entries, metric samples, label sets.
 * Scope: Type definitions and fixed constants only. Does not create records or perform IO.
 * Invariants:
 *   - Timestamps are Unix seconds (float), matching the `since` query contract
 *   - Histogram samples always carry DEFAULT_HISTOGRAM_BUCKETS (12 boundaries, last is +Inf)
 *   - Label sets are plain string records; insertion order is the emitted order
 * Side-effects: none
 * Links: Used by ports, adapters, encoders and the instrumentation pipeline.
 * @public
 */

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Scalar attribute value - anything that survives a JSON round trip unchanged. */
export type AttributeValue = string | number | boolean | null;

export type Attributes = Record<string, AttributeValue>;

export interface LogEntry {
  /** Unix timestamp in seconds */
  readonly timestamp: number;
  readonly level: LogLevel;
  readonly message: string;
  readonly attributes: Attributes;
}

export type LabelSet = Record<string, string>;

/**
 * Prometheus-convention latency buckets (seconds).
 * Part of the histogram contract: not configurable per metric.
 */
export const DEFAULT_HISTOGRAM_BUCKETS: readonly number[] = Object.freeze([
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
  Number.POSITIVE_INFINITY,
]);

export const METRIC_KINDS = ["counter", "gauge", "histogram"] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

interface MetricSampleBase {
  readonly name: string;
  /** Unix timestamp in seconds */
  readonly timestamp: number;
  readonly labels: LabelSet;
  readonly value: number;
}

export interface CounterSample extends MetricSampleBase {
  readonly kind: "counter";
}

export interface GaugeSample extends MetricSampleBase {
  readonly kind: "gauge";
}

export interface HistogramSample extends MetricSampleBase {
  readonly kind: "histogram";
  readonly buckets: readonly number[];
}

export type MetricSample = CounterSample | GaugeSample | HistogramSample;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

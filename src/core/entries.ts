// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/entries`
 * Purpose: Constructors for log entries and metric samples stamped with the current time.
 * Scope: Record construction only. Does not write to storage.
 * Invariants: Timestamps in Unix seconds; attribute and label records are copied, never shared.
 * Side-effects: none (reads wall clock)
 * @public
 */

import type {
  Attributes,
  CounterSample,
  GaugeSample,
  HistogramSample,
  LabelSet,
  LogEntry,
  LogLevel,
} from "./model.js";
import { DEFAULT_HISTOGRAM_BUCKETS } from "./model.js";

/** Wall clock in Unix seconds. */
export function nowSeconds(): number {
  return Date.now() / 1000;
}

export function log(
  level: LogLevel,
  message: string,
  attributes: Attributes = {},
  timestamp: number = nowSeconds()
): LogEntry {
  return { timestamp, level, message, attributes: { ...attributes } };
}

export const debug = (message: string, attributes?: Attributes): LogEntry =>
  log("DEBUG", message, attributes);

export const info = (message: string, attributes?: Attributes): LogEntry =>
  log("INFO", message, attributes);

export const warn = (message: string, attributes?: Attributes): LogEntry =>
  log("WARN", message, attributes);

export const error = (message: string, attributes?: Attributes): LogEntry =>
  log("ERROR", message, attributes);

export function counter(
  name: string,
  value = 1,
  labels: LabelSet = {},
  timestamp: number = nowSeconds()
): CounterSample {
  return { kind: "counter", name, value, labels: { ...labels }, timestamp };
}

export function gauge(
  name: string,
  value: number,
  labels: LabelSet = {},
  timestamp: number = nowSeconds()
): GaugeSample {
  return { kind: "gauge", name, value, labels: { ...labels }, timestamp };
}

export function histogram(
  name: string,
  value: number,
  labels: LabelSet = {},
  timestamp: number = nowSeconds()
): HistogramSample {
  return {
    kind: "histogram",
    name,
    value,
    labels: { ...labels },
    buckets: DEFAULT_HISTOGRAM_BUCKETS,
    timestamp,
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/encoding/ndjson`
 * Purpose: Newline-delimited JSON encoders for log entries and metric samples.
 * Scope: Pure serialization. Does not read storage.
 * Invariants: One JSON object per line, trailing newline; empty string for no input.
 * Side-effects: none
 * @public
 */

import type { LogEntry, MetricSample } from "../model.js";

function joinLines(lines: readonly string[]): string {
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

export function encodeLogs(entries: Iterable<LogEntry>): string {
  const lines: string[] = [];
  for (const entry of entries) {
    lines.push(
      JSON.stringify({
        timestamp: entry.timestamp,
        level: entry.level,
        message: entry.message,
        attributes: entry.attributes,
      })
    );
  }
  return joinLines(lines);
}

/** Bucket boundaries are omitted: they are fixed and +Inf has no JSON form. */
export function encodeMetricSamples(samples: Iterable<MetricSample>): string {
  const lines: string[] = [];
  for (const sample of samples) {
    lines.push(
      JSON.stringify({
        name: sample.name,
        kind: sample.kind,
        timestamp: sample.timestamp,
        value: sample.value,
        labels: sample.labels,
      })
    );
  }
  return joinLines(lines);
}

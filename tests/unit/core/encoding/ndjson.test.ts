// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/encoding/ndjson`
 * Purpose: Verifies NDJSON encoding of log entries and metric samples.
 * Scope: Encoder output format only.
 * Side-effects: none
 * Links: src/core/encoding/ndjson.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { encodeLogs, encodeMetricSamples } from "../../../../src/core/encoding/index.js";
import { counter, histogram, log } from "../../../../src/core/entries.js";

describe("encodeLogs", () => {
  it("returns an empty string for no entries", () => {
    expect(encodeLogs([])).toBe("");
  });

  it("writes one JSON object per line with a trailing newline", () => {
    const body = encodeLogs([
      log("INFO", "GET /health 200", { status_code: 200 }, 1700000000),
      log("ERROR", "boom", {}, 1700000001.5),
    ]);

    expect(body).toBe(
      '{"timestamp":1700000000,"level":"INFO","message":"GET /health 200","attributes":{"status_code":200}}\n' +
        '{"timestamp":1700000001.5,"level":"ERROR","message":"boom","attributes":{}}\n'
    );
  });
});

describe("encodeMetricSamples", () => {
  it("omits histogram buckets", () => {
    const body = encodeMetricSamples([
      counter("http_requests_total", 1, { method: "GET" }, 10),
      histogram("latency_seconds", 0.25, {}, 11),
    ]);

    expect(body.split("\n")).toEqual([
      '{"name":"http_requests_total","kind":"counter","timestamp":10,"value":1,"labels":{"method":"GET"}}',
      '{"name":"latency_seconds","kind":"histogram","timestamp":11,"value":0.25,"labels":{}}',
      "",
    ]);
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/storage/ring-buffer`
 * Purpose: Verifies bounded storage evicts oldest first and validates its capacity.
 * Scope: RingBuffer and the ring-buffer-backed log and metric stores.
 * Side-effects: none
 * Links: src/adapters/server/storage/ring-buffer.adapter.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  RingBuffer,
  RingBufferLogStorage,
  RingBufferMetricsStorage,
} from "../../../../../src/adapters/server/index.js";
import { log } from "../../../../../src/core/entries.js";
import { DEFAULT_HISTOGRAM_BUCKETS } from "../../../../../src/core/model.js";
import { FakeClock } from "../../../../_fakes/index.js";

describe("RingBuffer", () => {
  it("iterates oldest to newest and drops the oldest when full", () => {
    const buffer = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buffer.push(n);

    expect([...buffer]).toEqual([3, 4, 5]);
    expect(buffer.size).toBe(3);
  });

  it("reports partial fill", () => {
    const buffer = new RingBuffer<string>(4);
    buffer.push("a");
    expect([...buffer]).toEqual(["a"]);
    expect(buffer.size).toBe(1);
  });

  it.each([0, -1, 2.5, Number.NaN])("rejects capacity %s", (capacity) => {
    expect(() => new RingBuffer(capacity)).toThrow(RangeError);
  });
});

describe("RingBufferLogStorage", () => {
  it("keeps only the newest maxSize entries", async () => {
    const storage = new RingBufferLogStorage(2);
    await storage.write(log("INFO", "one", {}, 1));
    await storage.write(log("INFO", "two", {}, 2));
    await storage.write(log("INFO", "three", {}, 3));

    expect((await storage.read()).map((e) => e.message)).toEqual(["two", "three"]);
  });
});

describe("RingBufferMetricsStorage", () => {
  it("evicts old raw samples but keeps exposition totals", async () => {
    const clock = new FakeClock();
    const storage = new RingBufferMetricsStorage(2, clock);
    await storage.incrementCounter("jobs_total", {}, 1);
    await storage.incrementCounter("jobs_total", {}, 1);
    await storage.incrementCounter("jobs_total", {}, 1);

    expect(await storage.read()).toHaveLength(2);
    expect(await storage.render()).toBe("# TYPE jobs_total counter\njobs_total 3\n");
  });

  it("never lowers a counter when other families evict its samples", async () => {
    const storage = new RingBufferMetricsStorage(3, new FakeClock());
    for (let i = 0; i < 3; i++) {
      await storage.incrementCounter("c_total", { a: "x" }, 1);
    }
    const counterLine = async () =>
      (await storage.render()).split("\n").find((l) => l.startsWith("c_total{"));

    expect(await counterLine()).toBe('c_total{a="x"} 3');

    await storage.observeHistogram("lat_seconds", {}, 0.2, DEFAULT_HISTOGRAM_BUCKETS);
    await storage.observeHistogram("lat_seconds", {}, 0.4, DEFAULT_HISTOGRAM_BUCKETS);

    expect(await counterLine()).toBe('c_total{a="x"} 3');
    expect((await storage.read()).filter((s) => s.kind === "counter")).toHaveLength(1);
    expect((await storage.render()).split("\n")).toContain("lat_seconds_count 2");
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/telemetry/timed-writer`
 * Purpose: Verifies bounded writes resolve to outcomes and never reject.
 * Scope: writeBounded and reportWriteOutcome.
 * Invariants: Hung writes time out within the bound; failures are wrapped in StorageWriteError.
 * Side-effects: time (short real timers)
 * Links: src/telemetry/timed-writer.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  isStorageTimeoutError,
  isStorageWriteError,
} from "../../../src/core/errors.js";
import {
  reportWriteOutcome,
  writeBounded,
} from "../../../src/telemetry/timed-writer.js";
import { FakeClock, makeCapturingLogger } from "../../_fakes/index.js";

describe("writeBounded", () => {
  it("completes when the write resolves in time", async () => {
    const clock = new FakeClock();
    const outcome = await writeBounded(
      async () => {
        clock.advance(7);
      },
      100,
      { clock }
    );
    expect(outcome).toEqual({ status: "completed", elapsedMs: 7 });
  });

  it("times out a write that never settles", async () => {
    const started = performance.now();
    const outcome = await writeBounded(() => new Promise<void>(() => undefined), 30);
    const elapsed = performance.now() - started;

    expect(outcome).toEqual({ status: "timed_out", timeoutMs: 30 });
    expect(elapsed).toBeLessThan(1000);
  });

  it("wraps a rejected write", async () => {
    const cause = new Error("disk full");
    const outcome = await writeBounded(() => Promise.reject(cause), 100, {
      target: "log",
    });

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(isStorageWriteError(outcome.error)).toBe(true);
    expect(outcome.error.cause).toBe(cause);
    expect(outcome.error.target).toBe("log");
    expect(outcome.error.message).toBe("Storage write to log failed: disk full");
  });

  it("wraps a synchronous throw", async () => {
    const outcome = await writeBounded(() => {
      throw new Error("sync boom");
    }, 100);
    expect(outcome.status).toBe("failed");
  });

  it("absorbs a rejection that arrives after the timeout", async () => {
    let rejectLate: (error: Error) => void = () => undefined;
    const outcome = await writeBounded(
      () =>
        new Promise<void>((_, reject) => {
          rejectLate = reject;
        }),
      10
    );
    expect(outcome.status).toBe("timed_out");
    rejectLate(new Error("too late"));
    await new Promise((resolve) => setImmediate(resolve));
  });
});

describe("reportWriteOutcome", () => {
  it("logs nothing for a completed write", () => {
    const { logger, lines } = makeCapturingLogger();
    reportWriteOutcome(logger, { status: "completed", elapsedMs: 1 }, { target: "log" });
    expect(lines()).toEqual([]);
  });

  it("warns on timeout and errors on failure", async () => {
    const { logger, lines } = makeCapturingLogger();
    reportWriteOutcome(
      logger,
      { status: "timed_out", timeoutMs: 50 },
      { target: "log", requestId: "r-1" }
    );
    const failed = await writeBounded(() => Promise.reject(new Error("nope")), 50, {
      target: "http_requests_total",
    });
    reportWriteOutcome(logger, failed, { target: "http_requests_total" });

    const [warn, error] = lines();
    expect(warn?.level).toBe(40);
    expect(warn?.msg).toBe("telemetry write timed out");
    expect(warn?.target).toBe("log");
    expect(warn?.request_id).toBe("r-1");
    expect(error?.level).toBe(50);
    expect(error?.msg).toBe("telemetry write failed");
    expect(error?.target).toBe("http_requests_total");
  });

  it("classifies the timeout error", () => {
    const { logger, lines } = makeCapturingLogger();
    reportWriteOutcome(logger, { status: "timed_out", timeoutMs: 5 }, { target: "log" });
    const [line] = lines();
    const err = line?.err;
    expect(err).toMatchObject({
      type: "StorageTimeoutError",
      message: "Storage write to log exceeded 5ms",
    });
    expect(isStorageTimeoutError(new Error("x"))).toBe(false);
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/timed-writer`
 * Purpose: Bound a storage write by a timeout and turn every result into a value.
 * Scope: Race one write against a timer and report the outcome. No retries, no queuing.
 * Invariants:
 *   - writeBounded never rejects; sync throws and rejections become `failed`
 *   - A timed-out write is abandoned, not cancelled; its late rejection is absorbed by the race
 *   - The timer is unref'd and cleared once the race settles
 * Side-effects: time (setTimeout)
 * Links: Used by both instrumentation pipelines and the storage logger.
 * @public
 */

import type { Logger } from "pino";

import { StorageTimeoutError, StorageWriteError } from "../core/errors.js";
import type { Clock } from "../ports/index.js";
import { systemClock } from "../adapters/server/time/system.adapter.js";

export type WriteOutcome =
  | { readonly status: "completed"; readonly elapsedMs: number }
  | { readonly status: "timed_out"; readonly timeoutMs: number }
  | { readonly status: "failed"; readonly error: StorageWriteError };

export interface WriteBoundedOptions {
  /** Name of the destination, used in error messages. Default "storage". */
  target?: string;
  clock?: Clock;
}

export async function writeBounded(
  write: () => Promise<void>,
  timeoutMs: number,
  options: WriteBoundedOptions = {}
): Promise<WriteOutcome> {
  const target = options.target ?? "storage";
  const clock = options.clock ?? systemClock;
  const started = clock.monotonic();

  let pending: Promise<void>;
  try {
    pending = write();
  } catch (cause) {
    return { status: "failed", error: new StorageWriteError(target, cause) };
  }

  const completion = pending.then(
    (): WriteOutcome => ({
      status: "completed",
      elapsedMs: clock.monotonic() - started,
    }),
    (cause: unknown): WriteOutcome => ({
      status: "failed",
      error: new StorageWriteError(target, cause),
    })
  );

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<WriteOutcome>((resolve) => {
    const handle = setTimeout(
      () => resolve({ status: "timed_out", timeoutMs }),
      timeoutMs
    );
    handle.unref();
    timer = handle;
  });

  try {
    return await Promise.race([completion, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

export interface WriteReportMeta {
  target: string;
  requestId?: string | undefined;
}

/**
 * Send a non-completed outcome to the diagnostic logger.
 * Timeouts log at warn, failures at error, completions not at all.
 */
export function reportWriteOutcome(
  diagnostics: Logger,
  outcome: WriteOutcome,
  meta: WriteReportMeta
): void {
  switch (outcome.status) {
    case "completed":
      return;
    case "timed_out":
      diagnostics.warn(
        {
          err: new StorageTimeoutError(meta.target, outcome.timeoutMs),
          target: meta.target,
          request_id: meta.requestId,
        },
        "telemetry write timed out"
      );
      return;
    case "failed":
      diagnostics.error(
        { err: outcome.error, target: meta.target, request_id: meta.requestId },
        "telemetry write failed"
      );
      return;
  }
}

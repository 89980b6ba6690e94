// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/emission`
 * Purpose: Per-request log entry and metric emission shared by the async and sync pipelines.
 * Scope: Build the request LogEntry and labels, start every enabled write through the Timed Writer,
 *        and report non-completed outcomes. Does not manage context lifecycle.
 * Invariants:
 *   - The LogEntry is built synchronously, before the context is ended
 *   - All writes start together; one failing or hanging never skips another
 *   - The returned promise never rejects
 * Side-effects: IO (storage ports, diagnostic logger)
 * @internal
 */

import type { Logger } from "pino";

import type { RequestContext } from "../context/index.js";
import type { Attributes, LogEntry } from "../core/model.js";
import { describeException, levelForStatus } from "../core/rules.js";
import type { Clock, LogStoragePort } from "../ports/index.js";
import type { MiddlewareConfig } from "./config.js";
import type { MetricRecorder } from "./metric-recorder.js";
import { reportWriteOutcome, writeBounded } from "./timed-writer.js";

export interface EmissionDeps {
  readonly config: MiddlewareConfig;
  readonly logStorage: LogStoragePort;
  readonly recorder: MetricRecorder;
  readonly diagnostics: Logger;
  readonly clock: Clock;
}

export type RequestResult =
  | { readonly kind: "response"; readonly status: number }
  | { readonly kind: "exception"; readonly status: number; readonly error: unknown };

export interface FinishedRequest {
  readonly ctx: RequestContext;
  readonly method: string;
  /** Request path without query string */
  readonly path: string;
  /** Low-cardinality template for metric labels */
  readonly route: string;
  readonly durationMs: number;
  readonly result: RequestResult;
}

export function buildRequestLogEntry(
  request: FinishedRequest,
  timestamp: number
): LogEntry {
  const { ctx, method, path, durationMs, result } = request;
  const fixed: Attributes = {
    request_id: ctx.id,
    method,
    path,
    status_code: result.status,
    duration_ms: durationMs,
    ...(result.kind === "exception" ? describeException(result.error) : {}),
  };
  return {
    timestamp,
    level: result.kind === "exception" ? "ERROR" : levelForStatus(result.status),
    message: `${method} ${path} ${result.status}`,
    attributes: { ...fixed, ...ctx.snapshot(), ...fixed },
  };
}

export function emitRequestTelemetry(
  deps: EmissionDeps,
  request: FinishedRequest
): Promise<void> {
  const { config, clock, diagnostics } = deps;
  const requestId = request.ctx.id;

  const bounded = (target: string, write: () => Promise<void>) =>
    writeBounded(write, config.writeTimeoutMs, { target, clock }).then(
      (outcome) => reportWriteOutcome(diagnostics, outcome, { target, requestId })
    );

  const writes: Promise<void>[] = [];
  if (config.logRequests) {
    const entry = buildRequestLogEntry(request, clock.now() / 1000);
    writes.push(bounded("log", () => deps.logStorage.write(entry)));
  }
  if (config.recordMetrics) {
    const method = request.method;
    const path = request.route;
    writes.push(
      bounded(config.requestCounterName, () =>
        deps.recorder.incrementCounter(config.requestCounterName, {
          method,
          path,
          status: String(request.result.status),
        })
      ),
      bounded(config.requestHistogramName, () =>
        deps.recorder.observeHistogram(
          config.requestHistogramName,
          { method, path },
          request.durationMs / 1000
        )
      )
    );
  }

  return Promise.all(writes).then(
    () => undefined,
    (error: unknown) => {
      diagnostics.error({ err: error, request_id: requestId }, "telemetry emission failed");
    }
  );
}

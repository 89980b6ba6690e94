// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/pipeline`
 * Purpose: Instrumentation pipeline for async handlers.
 * Scope: START → RUNNING → {SUCCESS | HANDLER_EXCEPTION} → FINALIZING → DONE for one request.
 *        Does not time-box the handler or map errors to responses.
 * Invariants:
 *   - Excluded paths run the handler with no context and produce no telemetry
 *   - Exactly one log entry, one counter increment and one histogram observation per
 *     instrumented request, each subject to its config toggle
 *   - The handler's result is returned as-is; its error is re-thrown as the same object
 *   - The context is ended in `finally`, after emission, whatever happened before
 * Side-effects: IO (storage ports, diagnostic logger)
 * Notes: Emission is awaited, so worst-case added latency is one writeTimeoutMs.
 * Links: Wrapped by http/node-http and http/fetch adapters.
 * @public
 */

import { requestContext } from "../context/index.js";
import { emitRequestTelemetry, type RequestResult } from "./emission.js";
import type {
  AsyncHandler,
  HandleOptions,
  HandlerResponse,
  InboundRequest,
} from "./inbound.js";
import { BasePipeline, type PipelineDeps } from "./pipeline-base.js";

export class InstrumentationPipeline extends BasePipeline {
  constructor(deps: PipelineDeps) {
    super(deps, requestContext);
  }

  async handle<R extends HandlerResponse>(
    request: InboundRequest,
    next: AsyncHandler<R>,
    options?: HandleOptions
  ): Promise<R> {
    if (this.isExcluded(request.path)) {
      return next(undefined);
    }

    const started = this.start(request);
    const { ctx } = started;
    let result: RequestResult | undefined;
    try {
      const response = await this.contexts.enter(ctx, () => next(ctx));
      result = { kind: "response", status: response.status };
      return response;
    } catch (error) {
      result = this.failureResult(error, options);
      throw error;
    } finally {
      try {
        if (result) {
          const finished = this.finish(started, result);
          await this.contexts.enter(ctx, () =>
            emitRequestTelemetry(this.emission, finished)
          );
        }
      } finally {
        this.release(ctx);
      }
    }
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/sync-pipeline`
 * Purpose: Instrumentation pipeline for blocking handlers.
 * Scope: Same contract as InstrumentationPipeline, but handle() returns synchronously and emission
 *        is dispatched without blocking the response.
 * Invariants:
 *   - Context is bound with the sync call-frame store and ended before handle() returns
 *   - Dispatched emissions are tracked until settled; flush() waits for all of them
 * Side-effects: IO (storage ports, diagnostic logger)
 * @public
 */

import { syncRequestContext } from "../context/index.js";
import { emitRequestTelemetry, type RequestResult } from "./emission.js";
import type {
  HandleOptions,
  HandlerResponse,
  InboundRequest,
  SyncHandler,
} from "./inbound.js";
import { BasePipeline, type PipelineDeps } from "./pipeline-base.js";

export class SyncInstrumentationPipeline extends BasePipeline {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(deps: PipelineDeps) {
    super(deps, syncRequestContext);
  }

  /** Emissions dispatched and not yet settled. */
  get pending(): number {
    return this.inFlight.size;
  }

  handle<R extends HandlerResponse>(
    request: InboundRequest,
    next: SyncHandler<R>,
    options?: HandleOptions
  ): R {
    if (this.isExcluded(request.path)) {
      return next(undefined);
    }

    const started = this.start(request);
    const { ctx } = started;
    let result: RequestResult | undefined;
    try {
      const response = this.contexts.enter(ctx, () => next(ctx));
      result = { kind: "response", status: response.status };
      return response;
    } catch (error) {
      result = this.failureResult(error, options);
      throw error;
    } finally {
      try {
        if (result) {
          const finished = this.finish(started, result);
          this.dispatch(
            this.contexts.enter(ctx, () =>
              emitRequestTelemetry(this.emission, finished)
            )
          );
        }
      } finally {
        this.release(ctx);
      }
    }
  }

  /** Wait for every dispatched emission, including ones dispatched while waiting. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private dispatch(emission: Promise<void>): void {
    const tracked = emission.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
  }
}

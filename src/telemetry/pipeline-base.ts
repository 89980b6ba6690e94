// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/pipeline-base`
 * Purpose: State shared by the async and sync instrumentation pipelines.
 * Scope: Dependency defaults, exclusion, context begin/release, and FinishedRequest assembly.
 *        Subclasses own the RUNNING step and decide whether emission blocks.
 * Invariants: Route templates compile once per pipeline; release() never throws.
 * Side-effects: IO (diagnostic logger on cleanup failure)
 * @internal
 */

import type { Logger } from "pino";

import type {
  RequestContext,
  RequestContextManager,
} from "../context/index.js";
import { CleanupError } from "../core/errors.js";
import {
  compileRouteTemplates,
  isExcluded,
  normalizePath,
  type RouteTemplate,
  stripQuery,
} from "../core/path-matcher.js";
import { UNHANDLED_ERROR_STATUS } from "../core/rules.js";
import { systemClock } from "../adapters/server/time/system.adapter.js";
import { makeLogger } from "../observability/logger.js";
import type {
  Clock,
  LogStoragePort,
  MetricsStoragePort,
} from "../ports/index.js";
import type { MiddlewareConfig } from "./config.js";
import type { EmissionDeps, FinishedRequest, RequestResult } from "./emission.js";
import {
  type HandleOptions,
  type InboundRequest,
  readHeader,
} from "./inbound.js";
import { MetricRecorder } from "./metric-recorder.js";

export interface PipelineDeps {
  config: MiddlewareConfig;
  logStorage: LogStoragePort;
  metricsStorage: MetricsStoragePort;
  /** Channel for write failures and cleanup errors. Defaults to a stdout pino logger. */
  diagnostics?: Logger;
  clock?: Clock;
  contexts?: RequestContextManager;
}

export interface StartedRequest {
  readonly ctx: RequestContext;
  readonly method: string;
  readonly path: string;
  readonly startedAt: number;
}

export abstract class BasePipeline {
  readonly config: MiddlewareConfig;
  protected readonly contexts: RequestContextManager;
  protected readonly diagnostics: Logger;
  protected readonly emission: EmissionDeps;
  private readonly clock: Clock;
  private readonly routes: readonly RouteTemplate[];

  protected constructor(deps: PipelineDeps, contexts: RequestContextManager) {
    this.config = deps.config;
    this.contexts = deps.contexts ?? contexts;
    this.clock = deps.clock ?? systemClock;
    this.diagnostics =
      deps.diagnostics ?? makeLogger({ component: "request-telemetry" });
    this.routes = compileRouteTemplates(deps.config.routeTemplates);
    this.emission = {
      config: deps.config,
      logStorage: deps.logStorage,
      recorder: new MetricRecorder(deps.metricsStorage),
      diagnostics: this.diagnostics,
      clock: this.clock,
    };
  }

  isExcluded(path: string): boolean {
    return isExcluded(path, this.config.excludePaths);
  }

  /** Template used for the `path` metric label. */
  routeOf(path: string): string {
    return normalizePath(path, this.routes);
  }

  protected start(request: InboundRequest): StartedRequest {
    const seed = readHeader(request.headers, this.config.requestIdHeader);
    return {
      ctx: this.contexts.begin(seed),
      method: request.method.toUpperCase(),
      path: stripQuery(request.path) || "/",
      startedAt: this.clock.monotonic(),
    };
  }

  protected failureResult(
    error: unknown,
    options: HandleOptions | undefined
  ): RequestResult {
    return { kind: "exception", status: this.statusFor(error, options), error };
  }

  /** A throwing adapter mapping falls back to 500 and never replaces the handler error. */
  private statusFor(error: unknown, options: HandleOptions | undefined): number {
    const mapStatus = options?.statusForError;
    if (!mapStatus) return UNHANDLED_ERROR_STATUS;
    try {
      return mapStatus(error);
    } catch (mappingError) {
      this.diagnostics.error(
        { err: mappingError },
        "error status mapping failed"
      );
      return UNHANDLED_ERROR_STATUS;
    }
  }

  protected finish(
    started: StartedRequest,
    result: RequestResult
  ): FinishedRequest {
    return {
      ctx: started.ctx,
      method: started.method,
      path: started.path,
      route: this.routeOf(started.path),
      durationMs: this.clock.monotonic() - started.startedAt,
      result,
    };
  }

  protected release(ctx: RequestContext): void {
    try {
      this.contexts.end(ctx);
    } catch (cause) {
      const error = new CleanupError(ctx.id, cause);
      this.diagnostics.error(
        { err: error, request_id: ctx.id },
        "request context cleanup failed"
      );
    }
  }
}

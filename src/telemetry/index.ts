// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry`
 * Purpose: Public API for request instrumentation.
 * Scope: Re-exports only.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * @public
 */

export {
  createMiddlewareConfig,
  MAX_WRITE_TIMEOUT_MS,
  type MiddlewareConfig,
  type MiddlewareConfigInput,
  MiddlewareConfigSchema,
} from "./config.js";
export {
  buildRequestLogEntry,
  emitRequestTelemetry,
  type FinishedRequest,
  type RequestResult,
} from "./emission.js";
export {
  type AsyncHandler,
  type HandleOptions,
  type HandlerResponse,
  type HeaderSource,
  type InboundRequest,
  readHeader,
  type SyncHandler,
} from "./inbound.js";
export { MetricRecorder } from "./metric-recorder.js";
export { InstrumentationPipeline } from "./pipeline.js";
export type { PipelineDeps } from "./pipeline-base.js";
export { SyncInstrumentationPipeline } from "./sync-pipeline.js";
export {
  reportWriteOutcome,
  type WriteBoundedOptions,
  type WriteOutcome,
  type WriteReportMeta,
  writeBounded,
} from "./timed-writer.js";

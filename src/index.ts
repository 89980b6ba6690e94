// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry`
 * Purpose: Package entry point - request instrumentation, ambient context, storage adapters and endpoints.
 * Scope: Re-exports the public surface of each layer. Does not export bootstrap or the reference server.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * @public
 */

export {
  InMemoryLogStorage,
  InMemoryMetricsStorage,
  PrometheusMetricsStorage,
  type PrometheusMetricsStorageOptions,
  RingBufferLogStorage,
  RingBufferMetricsStorage,
  SystemClock,
  systemClock,
} from "./adapters/server/index.js";
export {
  AsyncContextStore,
  type ContextStore,
  clearLogContext,
  getLogContext,
  RequestContext,
  RequestContextManager,
  requestContext,
  SyncContextStore,
  syncRequestContext,
  updateLogContext,
} from "./context/index.js";
export {
  type AttributeValue,
  type Attributes,
  CleanupError,
  ConfigValidationError,
  compileRouteTemplates,
  counter,
  DEFAULT_HISTOGRAM_BUCKETS,
  encodeLogs,
  encodeMetricSamples,
  encodePrometheus,
  gauge,
  histogram,
  isCleanupError,
  isConfigValidationError,
  isExcluded,
  isStorageTimeoutError,
  isStorageWriteError,
  type LabelSet,
  type LogEntry,
  type LogLevel,
  levelForStatus,
  log,
  type MetricSample,
  normalizePath,
  PROMETHEUS_CONTENT_TYPE,
  StorageTimeoutError,
  StorageWriteError,
} from "./core/public.js";
export {
  createObservabilityHandler,
  type FetchHandler,
  instrumentFetchHandler,
  instrumentNodeListener,
  type NodeListener,
  type ObservabilityEndpointsDeps,
} from "./http/index.js";
export {
  makeLogger,
  makeNoopLogger,
  makeStorageLogger,
  type StorageLogger,
} from "./observability/index.js";
export type {
  Clock,
  LogQuery,
  LogStoragePort,
  MetricsExpositionPort,
  MetricsQuery,
  MetricsReaderPort,
  MetricsStoragePort,
} from "./ports/index.js";
export {
  createMiddlewareConfig,
  type HandleOptions,
  type HandlerResponse,
  type InboundRequest,
  InstrumentationPipeline,
  type MiddlewareConfig,
  type MiddlewareConfigInput,
  MetricRecorder,
  type PipelineDeps,
  SyncInstrumentationPipeline,
  type WriteOutcome,
  writeBounded,
} from "./telemetry/index.js";

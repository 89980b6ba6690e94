// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only. Does not modify or transform exports.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * @public
 */

export {
  debug,
  counter,
  error,
  gauge,
  histogram,
  info,
  log,
  nowSeconds,
  warn,
} from "./entries.js";
export {
  CleanupError,
  ConfigValidationError,
  isCleanupError,
  isConfigValidationError,
  isStorageTimeoutError,
  isStorageWriteError,
  StorageTimeoutError,
  StorageWriteError,
} from "./errors.js";
export {
  type AttributeValue,
  type Attributes,
  type CounterSample,
  DEFAULT_HISTOGRAM_BUCKETS,
  type GaugeSample,
  type HistogramSample,
  isLogLevel,
  type LabelSet,
  LOG_LEVELS,
  type LogEntry,
  type LogLevel,
  METRIC_KINDS,
  type MetricKind,
  type MetricSample,
} from "./model.js";
export {
  compileRouteTemplates,
  ID_PLACEHOLDER,
  isDynamicSegment,
  isExcluded,
  normalizePath,
  type RouteTemplate,
  stripQuery,
} from "./path-matcher.js";
export {
  describeException,
  levelForStatus,
  UNHANDLED_ERROR_STATUS,
} from "./rules.js";
export {
  encodeLogs,
  encodeMetricSamples,
  encodePrometheus,
  formatSampleValue,
  PrometheusAccumulator,
  PROMETHEUS_CONTENT_TYPE,
} from "./encoding/index.js";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/encoding`
 * Purpose: Public API for text encoders used by scrape endpoints.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { encodeLogs, encodeMetricSamples } from "./ndjson.js";
export {
  encodePrometheus,
  formatSampleValue,
  PrometheusAccumulator,
  PROMETHEUS_CONTENT_TYPE,
} from "./prometheus.js";

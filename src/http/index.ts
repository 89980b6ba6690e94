// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/http`
 * Purpose: Transport adapters and read endpoints.
 * Scope: Re-exports only.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  createObservabilityHandler,
  NDJSON_CONTENT_TYPE,
  type ObservabilityEndpointsDeps,
} from "./endpoints.js";
export { type FetchHandler, instrumentFetchHandler } from "./fetch.js";
export {
  type InstrumentedNodeListener,
  instrumentNodeListener,
  type NodeListener,
} from "./node-http.js";
export { sendFetchResponse, toFetchRequest } from "./node-bridge.js";
export { parseLevel, parseSince } from "./query-params.js";

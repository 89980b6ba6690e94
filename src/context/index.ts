// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/context`
 * Purpose: Public API for ambient request context.
 * Scope: Re-exports only.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  AsyncContextStore,
  type ContextStore,
  SyncContextStore,
} from "./context-store.js";
export {
  activeRequestContext,
  clearLogContext,
  getLogContext,
  updateLogContext,
} from "./log-context.js";
export {
  RequestContext,
  RequestContextManager,
  requestContext,
  syncRequestContext,
} from "./request-context.js";

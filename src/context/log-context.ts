// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/context/log-context`
 * Purpose: Ambient log-context API for application code.
 * Scope: Read and update the current request's attributes without threading the id through calls.
 * Invariants: Outside a request every function is a no-op or returns {}; `request_id` always reflects the context id.
 * Side-effects: none
 * Notes: The async manager is consulted first, then the sync manager.
 * @public
 */

import type { AttributeValue, Attributes } from "../core/model.js";
import {
  type RequestContext,
  requestContext,
  syncRequestContext,
} from "./request-context.js";

export function activeRequestContext(): RequestContext | undefined {
  return requestContext.current() ?? syncRequestContext.current();
}

export function getLogContext(): Attributes {
  const ctx = activeRequestContext();
  if (!ctx) return {};
  const merged: Attributes = { request_id: ctx.id, ...ctx.snapshot() };
  merged.request_id = ctx.id;
  return merged;
}

export function updateLogContext(
  attributes: Readonly<Record<string, AttributeValue>>
): void {
  const ctx = activeRequestContext();
  if (!ctx) return;
  for (const [key, value] of Object.entries(attributes)) {
    ctx.set(key, value);
  }
}

/** Drop custom attributes; the request id stays. */
export function clearLogContext(): void {
  activeRequestContext()?.clear();
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/inbound`
 * Purpose: Transport-neutral request and response shapes seen by the pipelines.
 * Scope: Types and case-insensitive header lookup. Does not parse bodies or URLs.
 * Invariants: Header lookup is case-insensitive for every HeaderSource; empty values read as absent.
 * Side-effects: none
 * @public
 */

import type { RequestContext } from "../context/index.js";

/** Fetch Headers, a plain record, or Node's IncomingHttpHeaders. */
export type HeaderSource =
  | Headers
  | Readonly<Record<string, string | readonly string[] | undefined>>;

export interface InboundRequest {
  readonly method: string;
  /** Request target; a query string or fragment is ignored. */
  readonly path: string;
  readonly headers?: HeaderSource | undefined;
}

export interface HandlerResponse {
  readonly status: number;
}

/** Context is undefined only for excluded paths. */
export type AsyncHandler<R extends HandlerResponse> = (
  ctx: RequestContext | undefined
) => Promise<R>;

export type SyncHandler<R extends HandlerResponse> = (
  ctx: RequestContext | undefined
) => R;

export interface HandleOptions {
  /** Adapter-specific mapping for thrown errors. Default 500. */
  statusForError?: (error: unknown) => number;
}

export function readHeader(
  headers: HeaderSource | undefined,
  name: string
): string | undefined {
  if (!headers) return undefined;
  if (headers instanceof Headers) return headers.get(name) || undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    const first = typeof value === "string" ? value : value?.[0];
    return first || undefined;
  }
  return undefined;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/http/fetch`
 * Purpose: Instrument a fetch-style `(Request) => Promise<Response>` handler.
 * Scope: Maps Request onto InboundRequest. Does not catch handler errors.
 * Invariants: With echoRequestId on, the returned Response carries the request id header,
 *             except network-error responses (status 0), which are returned as the same object.
 * Side-effects: none beyond the pipeline's
 * @public
 */

import type { HandleOptions } from "../telemetry/inbound.js";
import type { InstrumentationPipeline } from "../telemetry/pipeline.js";

export type FetchHandler = (request: Request) => Promise<Response>;

/** The Response constructor only takes 200-599, so network errors pass through untouched. */
function canEcho(response: Response): boolean {
  return (
    response.type !== "error" &&
    response.status >= 200 &&
    response.status <= 599
  );
}

export function instrumentFetchHandler(
  pipeline: InstrumentationPipeline,
  handler: FetchHandler,
  options?: HandleOptions
): FetchHandler {
  const { echoRequestId, requestIdHeader } = pipeline.config;

  return (request) => {
    const url = new URL(request.url);
    return pipeline.handle(
      {
        method: request.method,
        path: url.pathname,
        headers: request.headers,
      },
      async (ctx) => {
        const response = await handler(request);
        if (!ctx || !echoRequestId || !canEcho(response)) return response;
        // Response.redirect headers are immutable; copy before setting
        const echoed = new Response(response.body, response);
        echoed.headers.set(requestIdHeader, ctx.id);
        return echoed;
      },
      options
    );
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/http/node-http`
 * Purpose: Instrument a node:http request listener.
 * Scope: Maps IncomingMessage onto InboundRequest and reads the status from `res.statusCode`
 *        once the listener settles. Does not send error responses; a thrown error rejects the returned promise.
 * Invariants: The request id header is set before the listener runs, when echoRequestId is on.
 * Side-effects: IO (response header)
 * @public
 */

import type { IncomingMessage, ServerResponse } from "node:http";

import type { HandleOptions } from "../telemetry/inbound.js";
import type { InstrumentationPipeline } from "../telemetry/pipeline.js";

export type NodeListener = (
  req: IncomingMessage,
  res: ServerResponse
) => void | Promise<void>;

export type InstrumentedNodeListener = (
  req: IncomingMessage,
  res: ServerResponse
) => Promise<void>;

export function instrumentNodeListener(
  pipeline: InstrumentationPipeline,
  listener: NodeListener,
  options?: HandleOptions
): InstrumentedNodeListener {
  const { echoRequestId, requestIdHeader } = pipeline.config;

  return async (req, res) => {
    await pipeline.handle(
      {
        method: req.method ?? "GET",
        path: req.url ?? "/",
        headers: req.headers,
      },
      async (ctx) => {
        if (ctx && echoRequestId && !res.headersSent) {
          res.setHeader(requestIdHeader, ctx.id);
        }
        await listener(req, res);
        return { status: res.statusCode };
      },
      options
    );
  };
}

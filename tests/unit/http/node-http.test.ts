// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/http/node-http`
 * Purpose: Verifies node:http listener instrumentation.
 * Scope: Unconnected IncomingMessage/ServerResponse pairs; no listening server.
 * Side-effects: none
 * Links: src/http/node-http.ts
 * @public
 */

import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";

import { describe, expect, it } from "vitest";

import { instrumentNodeListener } from "../../../src/http/node-http.js";
import { makeAsyncPipeline } from "../../_fixtures/telemetry.js";

function exchange(method: string, url: string, headers: Record<string, string> = {}) {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  req.headers = headers;
  const res = new ServerResponse(req);
  return { req, res };
}

describe("instrumentNodeListener", () => {
  it("records res.statusCode and sets the request id header first", async () => {
    const { pipeline, logs } = makeAsyncPipeline();
    const headerSeenByListener: unknown[] = [];
    const listener = instrumentNodeListener(pipeline, (_req, res) => {
      headerSeenByListener.push(res.getHeader("x-request-id"));
      res.statusCode = 404;
    });
    const { req, res } = exchange("get", "/orders/42?page=2", {
      "x-request-id": "abc",
    });

    await listener(req, res);

    expect(headerSeenByListener).toEqual(["abc"]);
    const [entry] = await logs.read();
    expect(entry?.level).toBe("WARN");
    expect(entry?.message).toBe("GET /orders/42 404");
    expect(entry?.attributes.request_id).toBe("abc");
  });

  it("rejects with the listener error and logs status 500", async () => {
    const { pipeline, logs } = makeAsyncPipeline();
    const boom = new Error("listener failed");
    const listener = instrumentNodeListener(pipeline, async () => {
      throw boom;
    });
    const { req, res } = exchange("DELETE", "/things/1");

    await expect(listener(req, res)).rejects.toBe(boom);

    const [entry] = await logs.read();
    expect(entry?.message).toBe("DELETE /things/1 500");
    expect(entry?.attributes.exception).toBe("Error: listener failed");
  });
});

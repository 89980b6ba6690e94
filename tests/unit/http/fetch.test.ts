// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/http/fetch`
 * Purpose: Verifies fetch-handler instrumentation and request id echo.
 * Scope: In-process Request/Response objects only.
 * Side-effects: none
 * Links: src/http/fetch.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { instrumentFetchHandler } from "../../../src/http/fetch.js";
import { makeAsyncPipeline } from "../../_fixtures/telemetry.js";

describe("instrumentFetchHandler", () => {
  it("records the response status and echoes the request id", async () => {
    const { pipeline, logs, metrics } = makeAsyncPipeline();
    const handler = instrumentFetchHandler(pipeline, async () =>
      new Response("created", { status: 202 })
    );

    const response = await handler(new Request("http://localhost/items/5?x=1"));

    expect(response.status).toBe(202);
    expect(response.headers.get("x-request-id")).toBe("req-1");
    expect(await response.text()).toBe("created");

    const [entry] = await logs.read();
    expect(entry?.message).toBe("GET /items/5 202");
    const sample = (await metrics.read()).find((s) => s.kind === "counter");
    expect(sample?.labels).toEqual({
      method: "GET",
      path: "/items/{id}",
      status: "202",
    });
  });

  it("keeps an incoming request id", async () => {
    const { pipeline } = makeAsyncPipeline();
    const handler = instrumentFetchHandler(pipeline, async () => new Response(null));

    const response = await handler(
      new Request("http://localhost/a", { headers: { "X-Request-ID": "upstream-7" } })
    );

    expect(response.headers.get("x-request-id")).toBe("upstream-7");
  });

  it("leaves the response alone when echo is off", async () => {
    const { pipeline } = makeAsyncPipeline({ config: { echoRequestId: false } });
    const handler = instrumentFetchHandler(pipeline, async () => new Response(null));

    const response = await handler(new Request("http://localhost/a"));

    expect(response.headers.has("x-request-id")).toBe(false);
  });

  it("passes a network-error response through as the same object", async () => {
    const { pipeline, logs } = makeAsyncPipeline();
    const networkError = Response.error();
    const handler = instrumentFetchHandler(pipeline, async () => networkError);

    const response = await handler(new Request("http://localhost/a"));

    expect(response).toBe(networkError);
    expect(response.status).toBe(0);
    const [entry] = await logs.read();
    expect(entry?.level).toBe("INFO");
    expect(entry?.message).toBe("GET /a 0");
  });

  it("rethrows handler errors after logging them", async () => {
    const { pipeline, logs } = makeAsyncPipeline();
    const boom = new TypeError("bad input");
    const handler = instrumentFetchHandler(pipeline, async () => {
      throw boom;
    });

    await expect(handler(new Request("http://localhost/a", { method: "POST" }))).rejects.toBe(
      boom
    );

    const [entry] = await logs.read();
    expect(entry?.level).toBe("ERROR");
    expect(entry?.message).toBe("POST /a 500");
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/http/endpoints`
 * Purpose: Verifies the /logs, /metrics and /metrics/prometheus read endpoints.
 * Scope: Fetch-style handler over in-memory storage. No sockets.
 * Side-effects: none
 * Links: src/http/endpoints.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  InMemoryLogStorage,
  InMemoryMetricsStorage,
} from "../../../src/adapters/server/index.js";
import { log } from "../../../src/core/entries.js";
import { createObservabilityHandler } from "../../../src/http/endpoints.js";
import { FailingLogStorage, FakeClock, makeCapturingLogger } from "../../_fakes/index.js";

async function seededHandler(basePath?: string) {
  const logStorage = new InMemoryLogStorage();
  await logStorage.write(log("INFO", "first", {}, 10));
  await logStorage.write(log("WARN", "second", { n: 2 }, 20));
  const metrics = new InMemoryMetricsStorage(new FakeClock());
  await metrics.incrementCounter("jobs_total", { queue: "a" }, 2);

  return createObservabilityHandler({
    logStorage,
    metricsReader: metrics,
    exposition: metrics,
    diagnostics: makeCapturingLogger().logger,
    ...(basePath ? { basePath } : {}),
  });
}

const get = (path: string) => new Request(`http://localhost${path}`);

describe("createObservabilityHandler", () => {
  it("serves logs as NDJSON", async () => {
    const handler = await seededHandler();
    const response = await handler(get("/logs"));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/x-ndjson");
    expect((await response.text()).trimEnd().split("\n")).toHaveLength(2);
  });

  it("filters logs by since and level", async () => {
    const handler = await seededHandler();

    const newer = await (await handler(get("/logs?since=15"))).text();
    expect(newer).toBe(
      '{"timestamp":20,"level":"WARN","message":"second","attributes":{"n":2}}\n'
    );

    const warnings = await (await handler(get("/logs?level=warning"))).text();
    expect(warnings).toBe(newer);
  });

  it("treats a bad since and unknown level as no filter", async () => {
    const handler = await seededHandler();
    const body = await (await handler(get("/logs?since=-1&level=loud"))).text();
    expect(body.trimEnd().split("\n")).toHaveLength(2);
  });

  it("serves raw metric samples as NDJSON", async () => {
    const handler = await seededHandler();
    const response = await handler(get("/metrics?since=0"));

    expect(response.headers.get("content-type")).toBe("application/x-ndjson");
    expect(await response.text()).toBe(
      '{"name":"jobs_total","kind":"counter","timestamp":1704067200,"value":2,"labels":{"queue":"a"}}\n'
    );
  });

  it("serves the Prometheus exposition", async () => {
    const handler = await seededHandler();
    const response = await handler(get("/metrics/prometheus"));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe(
      "text/plain; version=0.0.4; charset=utf-8"
    );
    expect(await response.text()).toBe(
      '# TYPE jobs_total counter\njobs_total{queue="a"} 2\n'
    );
  });

  it("returns 404 for unknown paths and methods", async () => {
    const handler = await seededHandler();

    const unknown = await handler(get("/nope"));
    expect(unknown.status).toBe(404);
    expect(await unknown.text()).toBe("Not Found");

    const post = await handler(new Request("http://localhost/logs", { method: "POST" }));
    expect(post.status).toBe(404);
  });

  it("routes under a base path only", async () => {
    const handler = await seededHandler("/internal/");
    expect((await handler(get("/internal/logs"))).status).toBe(200);
    expect((await handler(get("/logs"))).status).toBe(404);
  });

  it("returns 404 for metric routes without a reader", async () => {
    const handler = createObservabilityHandler({
      logStorage: new InMemoryLogStorage(),
      diagnostics: makeCapturingLogger().logger,
    });
    expect((await handler(get("/metrics"))).status).toBe(404);
    expect((await handler(get("/metrics/prometheus"))).status).toBe(404);
  });

  it("returns 500 and reports when storage fails", async () => {
    const diagnostics = makeCapturingLogger();
    const handler = createObservabilityHandler({
      logStorage: new FailingLogStorage(),
      diagnostics: diagnostics.logger,
    });

    const response = await handler(get("/logs"));

    expect(response.status).toBe(500);
    expect(await response.text()).toBe("Internal Server Error");
    const [line] = diagnostics.lines();
    expect(line?.msg).toBe("observability endpoint failed");
    expect(line?.endpoint).toBe("/logs");
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/http/endpoints`
 * Purpose: Read-side HTTP endpoints for stored logs and metrics.
 * Scope: GET /logs, GET /metrics (NDJSON) and GET /metrics/prometheus (text exposition) as a fetch-style handler.
 * Invariants:
 *   - Unknown paths → 404 "Not Found"; storage or encoding failure → 500 "Internal Server Error" + diagnostic
 *   - Invalid `since` reads as 0; unknown `level` means no level filter
 * Side-effects: IO (storage reads, diagnostic logger)
 * Notes: Mount behind a prefix with `basePath`; keep the prefix in the pipeline's excludePaths.
 * @public
 */

import type { Logger } from "pino";

import { encodeLogs, encodeMetricSamples } from "../core/encoding/index.js";
import { makeLogger } from "../observability/logger.js";
import type {
  LogStoragePort,
  MetricsExpositionPort,
  MetricsReaderPort,
} from "../ports/index.js";
import { parseLevel, parseSince } from "./query-params.js";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export interface ObservabilityEndpointsDeps {
  logStorage: LogStoragePort;
  /** Serves /metrics; omitted → 404 */
  metricsReader?: MetricsReaderPort | undefined;
  /** Serves /metrics/prometheus; omitted → 404 */
  exposition?: MetricsExpositionPort | undefined;
  /** Prefix stripped before routing, e.g. `/internal` */
  basePath?: string;
  diagnostics?: Logger;
}

function text(status: number, body: string, contentType: string): Response {
  return new Response(body, {
    status,
    headers: { "content-type": contentType },
  });
}

const notFound = (): Response => text(404, "Not Found", "text/plain");

export function createObservabilityHandler(
  deps: ObservabilityEndpointsDeps
): (request: Request) => Promise<Response> {
  const basePath = (deps.basePath ?? "").replace(/\/+$/, "");
  const diagnostics =
    deps.diagnostics ?? makeLogger({ component: "observability-endpoints" });

  async function respond(
    endpoint: string,
    contentType: string,
    render: () => Promise<string>
  ): Promise<Response> {
    try {
      return text(200, await render(), contentType);
    } catch (error) {
      diagnostics.error({ err: error, endpoint }, "observability endpoint failed");
      return text(500, "Internal Server Error", contentType);
    }
  }

  return async (request) => {
    const url = new URL(request.url);
    if (request.method !== "GET" && request.method !== "HEAD") return notFound();
    if (basePath && !url.pathname.startsWith(`${basePath}/`)) return notFound();
    const path = url.pathname.slice(basePath.length);
    const params = url.searchParams;

    switch (path) {
      case "/logs":
        return respond(path, NDJSON_CONTENT_TYPE, async () => {
          const level = parseLevel(params.get("level"));
          const entries = await deps.logStorage.read({
            since: parseSince(params.get("since")),
            ...(level ? { level } : {}),
          });
          return encodeLogs(entries);
        });
      case "/metrics": {
        const reader = deps.metricsReader;
        if (!reader) return notFound();
        return respond(path, NDJSON_CONTENT_TYPE, async () =>
          encodeMetricSamples(
            await reader.read({ since: parseSince(params.get("since")) })
          )
        );
      }
      case "/metrics/prometheus": {
        const exposition = deps.exposition;
        if (!exposition) return notFound();
        return respond(path, exposition.contentType, () => exposition.render());
      }
      default:
        return notFound();
    }
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/server`
 * Purpose: Reference node:http service showing the instrumentation pipeline end to end.
 * Scope: Demo routes (/health, /users/:id, /boom) plus the observability endpoints under the configured base path.
 * Invariants: Handler errors reach the outer listener unchanged and become a plain 500 there.
 * Side-effects: IO (HTTP responses, logs)
 * @public
 */

import type { IncomingMessage, ServerResponse } from "node:http";

import type { Container } from "./bootstrap/container.js";
import { updateLogContext } from "./context/index.js";
import { stripQuery } from "./core/path-matcher.js";
import {
  instrumentNodeListener,
  sendFetchResponse,
  toFetchRequest,
} from "./http/index.js";

const USER_ROUTE = /^\/users\/([^/]+)$/;

function json(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}

export function createRequestListener(
  container: Container
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const basePath = container.env.OBSERVABILITY_BASE_PATH;
  const appLog = container.appLog.logger;

  const routes = async (
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> => {
    const path = stripQuery(req.url ?? "/");

    if (path.startsWith(`${basePath}/`)) {
      const response = await container.observabilityHandler(toFetchRequest(req));
      await sendFetchResponse(res, response);
      return;
    }

    if (path === "/health") {
      json(res, 200, { status: "ok" });
      return;
    }

    const user = USER_ROUTE.exec(path);
    if (user?.[1]) {
      updateLogContext({ user_id: user[1] });
      appLog.info("user lookup");
      json(res, 200, { id: user[1] });
      return;
    }

    if (path === "/boom") {
      throw new Error("boom");
    }

    json(res, 404, { error: "not found" });
  };

  const instrumented = instrumentNodeListener(container.pipeline, routes);

  return async (req, res) => {
    try {
      await instrumented(req, res);
    } catch (error) {
      container.log.error({ err: error }, "unhandled request error");
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader("content-type", "text/plain");
      }
      if (!res.writableEnded) res.end("Internal Server Error");
    }
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/http/node-bridge`
 * Purpose: Serve fetch-style handlers from a node:http server.
 * Scope: IncomingMessage → Request (no body) and Response → ServerResponse. GET/HEAD only.
 * Side-effects: IO (writes the response)
 * @public
 */

import type { IncomingMessage, ServerResponse } from "node:http";

export function toFetchRequest(req: IncomingMessage): Request {
  const host = req.headers.host ?? "localhost";
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers.set(name, Array.isArray(value) ? value.join(", ") : value);
  }
  return new Request(new URL(req.url ?? "/", `http://${host}`), {
    method: req.method ?? "GET",
    headers,
  });
}

export async function sendFetchResponse(
  res: ServerResponse,
  response: Response
): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(await response.text());
}

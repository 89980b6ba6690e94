// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/main`
 * Purpose: Process entry point for the reference service.
 * Scope: Start the HTTP server and shut it down on SIGTERM/SIGINT after in-flight emissions drain.
 * Side-effects: IO (listens on PORT), process signals
 * @public
 */

import { createServer } from "node:http";

import { getContainer } from "./bootstrap/container.js";
import { createRequestListener } from "./server.js";

const container = getContainer();
const listener = createRequestListener(container);

const server = createServer((req, res) => {
  void listener(req, res);
});

server.listen(container.env.PORT, () => {
  container.log.info({ port: container.env.PORT }, "server listening");
});

function shutdown(signal: NodeJS.Signals): void {
  container.log.info({ signal }, "shutting down");
  server.close((error) => {
    Promise.all([container.syncPipeline.flush(), container.appLog.flush()])
      .then(() => {
        if (error) container.log.error({ err: error }, "server close failed");
        process.exit(error ? 1 : 0);
      })
      .catch((flushError: unknown) => {
        container.log.error({ err: flushError }, "flush failed");
        process.exit(1);
      });
  });
}

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);

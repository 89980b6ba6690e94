// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/observability/logger`
 * Purpose: Pino logger factories - JSON stdout diagnostics and a LogStoragePort bridge.
 * Scope: Create configured pino loggers. Does not write request log entries (the pipeline does).
 * Invariants:
 *   - Every line carries the ambient log context (request_id + custom attributes) via mixin
 *   - Silent under Vitest / NODE_ENV=test
 *   - Safe to call at module scope (no env validation)
 * Side-effects: none
 * Notes: Use makeLogger for diagnostics; makeNoopLogger for tests; makeStorageLogger to route application logs into storage.
 * Links: REDACT_PATHS; storage bridge in ./storage-destination
 * @public
 */

import type { Logger, LoggerOptions } from "pino";
import pino from "pino";

import { getLogContext } from "../context/index.js";
import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

const SERVICE_KEY = "service";

export function baseLoggerOptions(
  bindings?: Record<string, unknown>
): LoggerOptions {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const level = process.env.LOG_LEVEL ?? "info";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const serviceName = process.env.SERVICE_NAME ?? "app";

  return {
    level: level.toLowerCase(),
    // Stable base: bindings first, then reserved keys
    base: { ...bindings, [SERVICE_KEY]: serviceName },
    messageKey: "msg",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    mixin: () => getLogContext(),
  };
}

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const nodeEnv = process.env.NODE_ENV ?? "development";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  // Always emit JSON to stdout (fd 1); formatting happens externally
  return pino(
    {
      ...baseLoggerOptions(bindings),
      enabled: !isTestTooling,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

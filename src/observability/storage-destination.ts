// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/observability/storage-destination`
 * Purpose: Pino destination that turns each JSON line into a LogEntry and writes it to a LogStoragePort.
 * Scope: Line parsing, level mapping and bounded writes. Does not buffer or retry.
 * Invariants:
 *   - pino trace/debug → DEBUG, info → INFO, warn → WARN, error/fatal → ERROR
 *   - `time` (epoch ms) becomes seconds; `level`, `time`, `msg`, `pid`, `hostname` never reach attributes
 *   - Non-scalar fields are stored as JSON strings
 *   - Write outcomes go to the diagnostic logger, never back into this destination
 * Side-effects: IO (storage port)
 * @public
 */

import type { Logger } from "pino";
import { pino } from "pino";
import { z } from "zod";

import type { AttributeValue, Attributes, LogEntry, LogLevel } from "../core/model.js";
import type { LogStoragePort } from "../ports/index.js";
import { reportWriteOutcome, writeBounded } from "../telemetry/timed-writer.js";
import { baseLoggerOptions, makeLogger } from "./logger.js";

const PinoLineSchema = z
  .object({
    level: z.number(),
    time: z.number(),
    msg: z.string().optional(),
  })
  .passthrough();

const RESERVED_KEYS = new Set(["level", "time", "msg", "pid", "hostname"]);

export function levelFromPino(level: number): LogLevel {
  if (level >= 50) return "ERROR";
  if (level >= 40) return "WARN";
  if (level >= 30) return "INFO";
  return "DEBUG";
}

function toAttributeValue(value: unknown): AttributeValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

/** Parse one pino JSON line; undefined for anything that is not one. */
export function parsePinoLine(line: string): LogEntry | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = PinoLineSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const attributes: Attributes = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (RESERVED_KEYS.has(key)) continue;
    attributes[key] = toAttributeValue(value);
  }
  return {
    timestamp: parsed.data.time / 1000,
    level: levelFromPino(parsed.data.level),
    message: parsed.data.msg ?? "",
    attributes,
  };
}

export interface StorageLoggerOptions {
  bindings?: Record<string, unknown>;
  /** Per-write bound. Default 1000. */
  writeTimeoutMs?: number;
  /** Where write failures go. Defaults to a stdout logger. */
  diagnostics?: Logger;
}

export interface StorageLogger {
  readonly logger: Logger;
  /** Resolves when every write started so far has settled. */
  flush(): Promise<void>;
}

export function makeStorageLogger(
  storage: LogStoragePort,
  options: StorageLoggerOptions = {}
): StorageLogger {
  const writeTimeoutMs = options.writeTimeoutMs ?? 1000;
  const diagnostics =
    options.diagnostics ?? makeLogger({ component: "storage-logger" });
  const inFlight = new Set<Promise<void>>();

  const destination = {
    write(line: string): void {
      const entry = parsePinoLine(line);
      if (!entry) return;
      const requestId = entry.attributes.request_id;
      const tracked = writeBounded(() => storage.write(entry), writeTimeoutMs, {
        target: "log",
      })
        .then((outcome) =>
          reportWriteOutcome(diagnostics, outcome, {
            target: "log",
            requestId: typeof requestId === "string" ? requestId : undefined,
          })
        )
        .finally(() => {
          inFlight.delete(tracked);
        });
      inFlight.add(tracked);
    },
  };

  const logger = pino(
    {
      ...baseLoggerOptions(options.bindings),
      timestamp: pino.stdTimeFunctions.epochTime,
    },
    destination
  );

  return {
    logger,
    async flush() {
      while (inFlight.size > 0) {
        await Promise.all(inFlight);
      }
    },
  };
}

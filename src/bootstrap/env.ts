// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/bootstrap/env`
 * Purpose: Environment variable validation and the mapping from env to middleware configuration.
 * Scope: Validates process.env lazily; parseEnv for explicit sources. Does not construct adapters.
 * Invariants: Validated on first access; fails fast with EnvValidationError listing missing and invalid keys.
 * Side-effects: process.env (read)
 * Notes: Comma-separated lists are trimmed and empty items dropped. Booleans accept true/false/1/0.
 * @public
 */

import { ZodError, z } from "zod";

import {
  createMiddlewareConfig,
  MAX_WRITE_TIMEOUT_MS,
  type MiddlewareConfig,
} from "../telemetry/config.js";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const csv = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

export const TELEMETRY_STORAGE_KINDS = [
  "memory",
  "ring_buffer",
  "prometheus",
] as const;

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Diagnostics
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  SERVICE_NAME: z.string().default("app"),

  // Reference server
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  OBSERVABILITY_BASE_PATH: z
    .string()
    .startsWith("/")
    .refine((path) => path.replace(/\/+$/, "") !== "", "must not be the root path")
    .default("/internal"),

  // Storage selection
  TELEMETRY_STORAGE: z.enum(TELEMETRY_STORAGE_KINDS).default("ring_buffer"),
  RING_BUFFER_SIZE: z.coerce.number().int().positive().default(10_000),

  // Middleware
  REQUEST_ID_HEADER: z.string().min(1).default("X-Request-ID"),
  WRITE_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .max(MAX_WRITE_TIMEOUT_MS)
    .default(1000),
  EXCLUDE_PATHS: csv,
  ROUTE_TEMPLATES: csv,
  LOG_REQUESTS: flag,
  RECORD_METRICS: flag,
  ECHO_REQUEST_ID: flag,
});

export type TelemetryEnv = z.infer<typeof envSchema> & {
  isProd: boolean;
  isTest: boolean;
};

export function parseEnv(
  source: Readonly<Record<string, string | undefined>>
): TelemetryEnv {
  try {
    const parsed = envSchema.parse(source);
    return {
      ...parsed,
      isProd: parsed.NODE_ENV === "production",
      isTest: parsed.NODE_ENV === "test",
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;
        // invalid_type here means the variable was absent
        if (issue.code === "invalid_type") {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: [...missing],
        invalid: [...invalid],
      });
    }
    throw error;
  }
}

let ENV: TelemetryEnv | null = null;

export function env(): TelemetryEnv {
  if (ENV === null) {
    // biome-ignore lint/style/noProcessEnv: Single validated entry point for env
    ENV = parseEnv(process.env);
  }
  return ENV;
}

/** For tests - forces re-validation on next env() call. */
export function resetEnv(): void {
  ENV = null;
}

export function middlewareConfigFromEnv(source: TelemetryEnv): MiddlewareConfig {
  const observabilityPattern = `${source.OBSERVABILITY_BASE_PATH.replace(/\/+$/, "")}/*`;
  const excludePaths = source.EXCLUDE_PATHS.includes(observabilityPattern)
    ? source.EXCLUDE_PATHS
    : [...source.EXCLUDE_PATHS, observabilityPattern];

  return createMiddlewareConfig({
    excludePaths,
    requestIdHeader: source.REQUEST_ID_HEADER,
    logRequests: source.LOG_REQUESTS,
    recordMetrics: source.RECORD_METRICS,
    writeTimeoutMs: source.WRITE_TIMEOUT_MS,
    routeTemplates: source.ROUTE_TEMPLATES,
    echoRequestId: source.ECHO_REQUEST_ID,
  });
}

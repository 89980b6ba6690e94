// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/telemetry/config`
 * Purpose: Validated, immutable middleware configuration.
 * Scope: Zod schema with defaults and the factory that freezes the parsed result. Does not read process.env.
 * Invariants: Returned config and its arrays are frozen; unknown keys are rejected.
 * Side-effects: none
 * Links: Built from env by bootstrap/env; consumed by both pipelines.
 * @public
 */

import { z } from "zod";

import { ConfigValidationError } from "../core/errors.js";

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;

/** Largest delay setTimeout honours; Node clamps anything above to 1ms. */
export const MAX_WRITE_TIMEOUT_MS = 2_147_483_647;

export const MiddlewareConfigSchema = z
  .object({
    excludePaths: z.array(z.string().min(1)).default([]),
    requestIdHeader: z.string().min(1).default("X-Request-ID"),
    logRequests: z.boolean().default(true),
    recordMetrics: z.boolean().default(true),
    requestCounterName: z
      .string()
      .regex(METRIC_NAME, "must be a valid metric name")
      .default("http_requests_total"),
    requestHistogramName: z
      .string()
      .regex(METRIC_NAME, "must be a valid metric name")
      .default("http_request_duration_seconds"),
    writeTimeoutMs: z
      .number()
      .positive()
      .max(MAX_WRITE_TIMEOUT_MS)
      .default(1000),
    routeTemplates: z
      .array(z.string().startsWith("/", "must start with /"))
      .default([]),
    echoRequestId: z.boolean().default(true),
  })
  .strict();

export type MiddlewareConfigInput = z.input<typeof MiddlewareConfigSchema>;

export interface MiddlewareConfig {
  readonly excludePaths: readonly string[];
  readonly requestIdHeader: string;
  readonly logRequests: boolean;
  readonly recordMetrics: boolean;
  readonly requestCounterName: string;
  readonly requestHistogramName: string;
  readonly writeTimeoutMs: number;
  readonly routeTemplates: readonly string[];
  readonly echoRequestId: boolean;
}

export function createMiddlewareConfig(
  input: MiddlewareConfigInput = {}
): MiddlewareConfig {
  const parsed = MiddlewareConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigValidationError(parsed.error.issues);
  }
  const data = parsed.data;
  return Object.freeze({
    ...data,
    excludePaths: Object.freeze([...data.excludePaths]),
    routeTemplates: Object.freeze([...data.routeTemplates]),
  });
}

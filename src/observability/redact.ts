// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/observability/redact`
 * Purpose: Redaction paths for sensitive data in diagnostic logs.
 * Scope: Path list only. Does not implement redaction logic.
 * Invariants: Only known secret-bearing keys; request attributes like `path` stay visible.
 * Side-effects: none
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "access_token",
  "refresh_token",
  "secret",
  "apiKey",
  "api_key",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",
  "res.headers.set-cookie",
];

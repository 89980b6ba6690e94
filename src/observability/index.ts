// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/observability`
 * Purpose: Public API for diagnostic and application logging.
 * Scope: Re-exports only.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  baseLoggerOptions,
  type Logger,
  makeLogger,
  makeNoopLogger,
} from "./logger.js";
export { REDACT_PATHS } from "./redact.js";
export {
  levelFromPino,
  makeStorageLogger,
  parsePinoLine,
  type StorageLogger,
  type StorageLoggerOptions,
} from "./storage-destination.js";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/ports/log-storage.port`
 * Purpose: Port interface for persisting and reading structured log entries.
 * Scope: Defines the storage contract; does not implement persistence or encoding.
 * Invariants:
 *   - Safe for concurrent invocation from many requests
 *   - read() returns entries with timestamp > since, ascending by timestamp
 *   - Errors surface as rejected promises; callers bound and contain them
 * Side-effects: none (interface only)
 * Links: Implemented by InMemoryLogStorage, RingBufferLogStorage; consumed by the pipeline and endpoints.
 * @public
 */

import type { LogEntry, LogLevel } from "../core/model.js";

export interface LogQuery {
  /** Unix seconds; only entries strictly newer are returned. Default 0. */
  since?: number;
  /** Exact level filter. Omit for all levels. */
  level?: LogLevel;
}

export interface LogStoragePort {
  write(entry: LogEntry): Promise<void>;
  read(query?: LogQuery): Promise<readonly LogEntry[]>;
}

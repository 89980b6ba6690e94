// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Type-only exports, no export *
 * Side-effects: none
 * Links: Used by adapters, telemetry and http layers for port contracts
 * @public
 */

export type { Clock } from "./clock.port.js";
export type { LogQuery, LogStoragePort } from "./log-storage.port.js";
export type {
  MetricsExpositionPort,
  MetricsQuery,
  MetricsReaderPort,
  MetricsStoragePort,
} from "./metrics-storage.port.js";

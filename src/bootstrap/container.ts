// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/bootstrap/container`
 * Purpose: Composition root - env-selected storage adapters wired into pipelines, endpoints and loggers.
 * Scope: Wire adapters to ports. Does not start servers or handle requests.
 * Invariants: Single container instance per process; all pipelines share one storage pair and one config.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: TELEMETRY_STORAGE picks memory, ring_buffer (default) or prometheus metrics. Logs are ring-buffered unless memory.
 * Links: Used by main.ts; tests build containers from parseEnv().
 * @public
 */

import type { Logger } from "pino";

import {
  InMemoryLogStorage,
  InMemoryMetricsStorage,
  PrometheusMetricsStorage,
  RingBufferLogStorage,
  RingBufferMetricsStorage,
  SystemClock,
} from "../adapters/server/index.js";
import { createObservabilityHandler } from "../http/index.js";
import {
  makeLogger,
  makeStorageLogger,
  type StorageLogger,
} from "../observability/index.js";
import type {
  Clock,
  LogStoragePort,
  MetricsExpositionPort,
  MetricsReaderPort,
  MetricsStoragePort,
} from "../ports/index.js";
import {
  InstrumentationPipeline,
  type MiddlewareConfig,
  SyncInstrumentationPipeline,
} from "../telemetry/index.js";
import { env, middlewareConfigFromEnv, type TelemetryEnv } from "./env.js";

export interface TelemetryStorage {
  logStorage: LogStoragePort;
  metricsStorage: MetricsStoragePort;
  /** Raw sample reads; absent for prom-client storage */
  metricsReader?: MetricsReaderPort | undefined;
  exposition: MetricsExpositionPort;
}

export interface Container {
  log: Logger;
  env: TelemetryEnv;
  config: MiddlewareConfig;
  clock: Clock;
  storage: TelemetryStorage;
  pipeline: InstrumentationPipeline;
  syncPipeline: SyncInstrumentationPipeline;
  /** Application logger whose lines land in log storage */
  appLog: StorageLogger;
  observabilityHandler: (request: Request) => Promise<Response>;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer(env());
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

export function createStorage(
  source: TelemetryEnv,
  clock: Clock
): TelemetryStorage {
  switch (source.TELEMETRY_STORAGE) {
    case "memory": {
      const metrics = new InMemoryMetricsStorage(clock);
      return {
        logStorage: new InMemoryLogStorage(),
        metricsStorage: metrics,
        metricsReader: metrics,
        exposition: metrics,
      };
    }
    case "ring_buffer": {
      const metrics = new RingBufferMetricsStorage(
        source.RING_BUFFER_SIZE,
        clock
      );
      return {
        logStorage: new RingBufferLogStorage(source.RING_BUFFER_SIZE),
        metricsStorage: metrics,
        metricsReader: metrics,
        exposition: metrics,
      };
    }
    case "prometheus": {
      const metrics = new PrometheusMetricsStorage({
        collectDefaultMetrics: !source.isTest,
      });
      return {
        logStorage: new RingBufferLogStorage(source.RING_BUFFER_SIZE),
        metricsStorage: metrics,
        exposition: metrics,
      };
    }
  }
}

export function createContainer(source: TelemetryEnv): Container {
  const log = makeLogger({ component: "container" });
  const clock = new SystemClock();
  const config = middlewareConfigFromEnv(source);
  const storage = createStorage(source, clock);

  // Startup log - confirm config (no secrets)
  log.info(
    {
      storage: source.TELEMETRY_STORAGE,
      logLevel: source.LOG_LEVEL,
      excludePaths: config.excludePaths,
      writeTimeoutMs: config.writeTimeoutMs,
    },
    "container initialized"
  );

  const diagnostics = makeLogger({ component: "request-telemetry" });
  const deps = {
    config,
    logStorage: storage.logStorage,
    metricsStorage: storage.metricsStorage,
    diagnostics,
    clock,
  };

  return {
    log,
    env: source,
    config,
    clock,
    storage,
    pipeline: new InstrumentationPipeline(deps),
    syncPipeline: new SyncInstrumentationPipeline(deps),
    appLog: makeStorageLogger(storage.logStorage, {
      writeTimeoutMs: config.writeTimeoutMs,
      diagnostics,
    }),
    observabilityHandler: createObservabilityHandler({
      logStorage: storage.logStorage,
      metricsReader: storage.metricsReader,
      exposition: storage.exposition,
      basePath: source.OBSERVABILITY_BASE_PATH,
      diagnostics,
    }),
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/adapters/server/storage/ring-buffer`
 * Purpose: Fixed-capacity log and metric storage with oldest-first eviction.
 * Scope: Implements the same ports as the in-memory adapters over a circular buffer.
 * Invariants: Never holds more than maxSize items; iteration yields oldest to newest.
 * Side-effects: none (process memory only)
 * Links: Implements ports/log-storage.port, ports/metrics-storage.port
 * @public
 */

import type { LogEntry, MetricSample } from "../../../core/model.js";
import type { Clock, LogQuery, LogStoragePort } from "../../../ports/index.js";
import { systemClock } from "../time/system.adapter.js";
import { SampleMetricsStorage, selectLogs } from "./in-memory.adapter.js";

export class RingBuffer<T> implements Iterable<T> {
  private readonly items: (T | undefined)[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Ring buffer capacity must be a positive integer, got ${capacity}`
      );
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    const end = (this.start + this.count) % this.capacity;
    this.items[end] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.start + i) % this.capacity];
      if (item !== undefined) yield item;
    }
  }
}

export class RingBufferLogStorage implements LogStoragePort {
  private readonly buffer: RingBuffer<LogEntry>;

  constructor(maxSize: number) {
    this.buffer = new RingBuffer(maxSize);
  }

  async write(entry: LogEntry): Promise<void> {
    this.buffer.push(entry);
  }

  async read(query?: LogQuery): Promise<readonly LogEntry[]> {
    return selectLogs(this.buffer, query);
  }
}

export class RingBufferMetricsStorage extends SampleMetricsStorage {
  private readonly buffer: RingBuffer<MetricSample>;

  constructor(maxSize: number, clock: Clock = systemClock) {
    super(clock);
    this.buffer = new RingBuffer(maxSize);
  }

  protected append(sample: MetricSample): void {
    this.buffer.push(sample);
  }

  protected samples(): Iterable<MetricSample> {
    return this.buffer;
  }
}

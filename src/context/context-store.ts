// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/context/context-store`
 * Purpose: Execution-unit-scoped storage cells for ambient request context.
 * Scope: Bind a value for the duration of a callback and read it back from nested code. Does not know what the value is.
 * Invariants:
 *   - get() inside run(value, fn) returns value, at any call depth
 *   - After run returns or throws, get() returns whatever was bound before
 *   - AsyncContextStore bindings survive await; SyncContextStore bindings do not
 * Side-effects: none
 * Notes: SyncContextStore is a plain module-level cell, so it is per worker thread in Node.
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface ContextStore<T> {
  run<R>(value: T, fn: () => R): R;
  get(): T | undefined;
}

export class AsyncContextStore<T> implements ContextStore<T> {
  private readonly storage = new AsyncLocalStorage<T>();

  run<R>(value: T, fn: () => R): R {
    return this.storage.run(value, fn);
  }

  get(): T | undefined {
    return this.storage.getStore();
  }
}

export class SyncContextStore<T> implements ContextStore<T> {
  private cell: T | undefined;

  run<R>(value: T, fn: () => R): R {
    const previous = this.cell;
    this.cell = value;
    try {
      return fn();
    } finally {
      this.cell = previous;
    }
  }

  get(): T | undefined {
    return this.cell;
  }
}

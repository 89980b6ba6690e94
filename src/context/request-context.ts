// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/context/request-context`
 * Purpose: Per-request correlation id and mutable attribute record, bound ambiently to the running request.
 * Scope: Context lifecycle (begin, enter, current, end) over a ContextStore. Does not emit logs or metrics.
 * Invariants:
 *   - Seed ids are used verbatim when non-empty; otherwise a UUID v4 is generated
 *   - end() is idempotent, clears attributes, and hides the handle from current()
 *   - set/get outside an active context are no-ops / undefined, never errors
 * Side-effects: none
 * Links: Used by the instrumentation pipelines and the log-context API.
 * @public
 */

import { randomUUID } from "node:crypto";

import type { AttributeValue, Attributes } from "../core/model.js";
import {
  AsyncContextStore,
  type ContextStore,
  SyncContextStore,
} from "./context-store.js";

export class RequestContext {
  private readonly attributes = new Map<string, AttributeValue>();
  private closed = false;

  constructor(readonly id: string) {}

  get ended(): boolean {
    return this.closed;
  }

  set(key: string, value: AttributeValue): void {
    if (this.closed) return;
    this.attributes.set(key, value);
  }

  get(key: string): AttributeValue | undefined {
    return this.closed ? undefined : this.attributes.get(key);
  }

  /** Custom attributes in insertion order. */
  snapshot(): Attributes {
    return Object.fromEntries(this.attributes);
  }

  clear(): void {
    this.attributes.clear();
  }

  end(): void {
    this.closed = true;
    this.attributes.clear();
  }
}

export class RequestContextManager {
  constructor(
    private readonly store: ContextStore<RequestContext>,
    private readonly generateId: () => string = randomUUID
  ) {}

  begin(seedId?: string): RequestContext {
    return new RequestContext(seedId ? seedId : this.generateId());
  }

  /** Run fn with ctx as the current context for everything it calls. */
  enter<R>(ctx: RequestContext, fn: () => R): R {
    return this.store.run(ctx, fn);
  }

  current(): RequestContext | undefined {
    const ctx = this.store.get();
    return ctx && !ctx.ended ? ctx : undefined;
  }

  set(key: string, value: AttributeValue): void {
    this.current()?.set(key, value);
  }

  get(key: string): AttributeValue | undefined {
    return this.current()?.get(key);
  }

  end(ctx: RequestContext): void {
    ctx.end();
  }

  run<R>(seedId: string | undefined, fn: (ctx: RequestContext) => R): R {
    const ctx = this.begin(seedId);
    try {
      return this.enter(ctx, () => fn(ctx));
    } finally {
      this.end(ctx);
    }
  }

  async runAsync<R>(
    seedId: string | undefined,
    fn: (ctx: RequestContext) => Promise<R>
  ): Promise<R> {
    const ctx = this.begin(seedId);
    try {
      return await this.enter(ctx, () => fn(ctx));
    } finally {
      this.end(ctx);
    }
  }
}

/** Default manager for async handlers (AsyncLocalStorage). */
export const requestContext = new RequestContextManager(
  new AsyncContextStore<RequestContext>()
);

/** Default manager for blocking handlers (call-frame cell). */
export const syncRequestContext = new RequestContextManager(
  new SyncContextStore<RequestContext>()
);

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/ports/harness/log-storage.port`
 * Purpose: Contract tests every LogStoragePort adapter must pass.
 * Scope: Write/read round trip, since and level filters, ordering and concurrent writes.
 * Invariants: read() returns entries newer than `since`, ascending, equal timestamps in write order.
 * Side-effects: none
 * Notes: Called from adapter specs; not executed directly by Vitest.
 * Links: src/ports/log-storage.port.ts
 * @internal
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { log } from "../../../src/core/entries.js";
import type { LogStoragePort } from "../../../src/ports/index.js";
import { dispose, makeHarness, type TestHarness } from "./factory.js";

export function registerLogStoragePortContract(
  makePort: (h: TestHarness) => Promise<LogStoragePort>
): void {
  describe("LogStoragePort contract", () => {
    let h: TestHarness;
    let port: LogStoragePort;

    beforeEach(async () => {
      h = await makeHarness();
      port = await makePort(h);
    });

    afterEach(async () => {
      await dispose(h);
    });

    it("reads back nothing when empty", async () => {
      expect(await port.read()).toEqual([]);
    });

    it("returns entries ascending by timestamp", async () => {
      await port.write(log("INFO", "c", {}, 30));
      await port.write(log("INFO", "a", {}, 10));
      await port.write(log("INFO", "b", {}, 20));

      const messages = (await port.read()).map((e) => e.message);
      expect(messages).toEqual(["a", "b", "c"]);
    });

    it("keeps write order for equal timestamps", async () => {
      await port.write(log("INFO", "first", {}, 5));
      await port.write(log("INFO", "second", {}, 5));

      const messages = (await port.read()).map((e) => e.message);
      expect(messages).toEqual(["first", "second"]);
    });

    it("treats since as strictly newer", async () => {
      await port.write(log("INFO", "old", {}, 10));
      await port.write(log("INFO", "new", {}, 11));

      const entries = await port.read({ since: 10 });
      expect(entries.map((e) => e.message)).toEqual(["new"]);
    });

    it("filters by exact level", async () => {
      await port.write(log("INFO", "fine", {}, 1));
      await port.write(log("ERROR", "broken", { code: 7 }, 2));

      expect(await port.read({ level: "ERROR" })).toEqual([
        { timestamp: 2, level: "ERROR", message: "broken", attributes: { code: 7 } },
      ]);
    });

    it("accepts concurrent writes", async () => {
      await Promise.all(
        Array.from({ length: 50 }, (_, i) => port.write(log("DEBUG", `m${i}`, {}, i + 1)))
      );
      expect(await port.read()).toHaveLength(50);
    });
  });
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/rules`
 * Purpose: Verifies status-to-level policy and exception description.
 * Scope: Pure functions only.
 * Side-effects: none
 * Links: src/core/rules.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { describeException, levelForStatus } from "../../../src/core/rules.js";

describe("levelForStatus", () => {
  it.each([
    [200, "INFO"],
    [302, "INFO"],
    [399, "INFO"],
    [400, "WARN"],
    [404, "WARN"],
    [499, "WARN"],
    [500, "ERROR"],
    [503, "ERROR"],
  ] as const)("maps %i to %s", (status, level) => {
    expect(levelForStatus(status)).toBe(level);
  });
});

describe("describeException", () => {
  it("renders errors as name and message", () => {
    expect(describeException(new TypeError("bad input"))).toEqual({
      exception: "TypeError: bad input",
      exception_type: "TypeError",
    });
  });

  it("uses the name alone when the message is empty", () => {
    expect(describeException(new Error())).toEqual({
      exception: "Error",
      exception_type: "Error",
    });
  });

  it("stringifies non-error values", () => {
    expect(describeException("plain string")).toEqual({
      exception: "plain string",
      exception_type: "string",
    });
  });
});

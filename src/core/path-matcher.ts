// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/path-matcher`
 * Purpose: Exclusion matching and low-cardinality path normalization for metric labels.
 * Scope: Pure string functions. Does not know about HTTP frameworks or their routers.
 * Invariants:
 *   - Patterns ending in `*` match by prefix (the substring before `*`); others match exactly
 *   - Query string and fragment never take part in matching or labels
 *   - Distinct templates are bounded by (route templates + distinct non-id paths), never by id count
 * Side-effects: none
 * Notes: Route table wins over heuristics; first matching template wins. Heuristic ids are
 *        digits, UUIDs, hex runs >= 16 chars, and letter+digit tokens >= 16 chars.
 * Links: Used by the instrumentation pipeline for exclusion and the `path` metric label.
 * @public
 */

const UUID_SEGMENT =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const NUMERIC_SEGMENT = /^\d+$/;
const HEX_SEGMENT = /^[0-9a-f]{16,}$/i;
const OPAQUE_TOKEN_SEGMENT = /^(?=[^/]*\d)(?=[^/]*[a-z])[a-z0-9_-]{16,}$/i;

export const ID_PLACEHOLDER = "{id}";

export interface RouteTemplate {
  /** Original template, e.g. `/users/:userId` */
  readonly source: string;
  /** Rendered label value, e.g. `/users/{userId}` */
  readonly label: string;
  readonly segments: readonly RouteSegment[];
}

type RouteSegment =
  | { readonly type: "literal"; readonly value: string }
  | { readonly type: "param"; readonly name: string };

/** Drop query string and fragment. */
export function stripQuery(path: string): string {
  const end = path.search(/[?#]/);
  return end === -1 ? path : path.slice(0, end);
}

export function isExcluded(
  path: string,
  patterns: readonly string[]
): boolean {
  const bare = stripQuery(path);
  return patterns.some((pattern) =>
    pattern.endsWith("*")
      ? bare.startsWith(pattern.slice(0, -1))
      : bare === pattern
  );
}

export function isDynamicSegment(segment: string): boolean {
  return (
    NUMERIC_SEGMENT.test(segment) ||
    UUID_SEGMENT.test(segment) ||
    HEX_SEGMENT.test(segment) ||
    OPAQUE_TOKEN_SEGMENT.test(segment)
  );
}

function splitSegments(path: string): string[] {
  let bare = stripQuery(path);
  if (bare === "") return [];
  if (!bare.startsWith("/")) bare = `/${bare}`;
  if (bare.length > 1 && bare.endsWith("/")) bare = bare.slice(0, -1);
  return bare === "/" ? [] : bare.slice(1).split("/");
}

/**
 * Compile route templates (`/users/:id`) once at configuration time.
 */
export function compileRouteTemplates(
  templates: readonly string[]
): readonly RouteTemplate[] {
  return templates.map((source) => {
    const segments: RouteSegment[] = splitSegments(source).map((part) =>
      part.startsWith(":") && part.length > 1
        ? { type: "param", name: part.slice(1) }
        : { type: "literal", value: part }
    );
    const label = `/${segments
      .map((s) => (s.type === "param" ? `{${s.name}}` : s.value))
      .join("/")}`;
    return { source, label, segments };
  });
}

function matchTemplate(
  segments: readonly string[],
  template: RouteTemplate
): boolean {
  if (segments.length !== template.segments.length) return false;
  return template.segments.every((expected, i) =>
    expected.type === "param"
      ? (segments[i] ?? "") !== ""
      : expected.value === segments[i]
  );
}

/**
 * Normalize a concrete request path into a low-cardinality template.
 *
 * @example
 * normalizePath("/users/123?tab=1") // "/users/{id}"
 * normalizePath("/orders/7/items", compileRouteTemplates(["/orders/:orderId/items"]))
 * // "/orders/{orderId}/items"
 */
export function normalizePath(
  path: string,
  routes: readonly RouteTemplate[] = []
): string {
  const segments = splitSegments(path);
  const matched = routes.find((route) => matchTemplate(segments, route));
  if (matched) return matched.label;
  if (segments.length === 0) return "/";
  return `/${segments
    .map((segment) => (isDynamicSegment(segment) ? ID_PLACEHOLDER : segment))
    .join("/")}`;
}

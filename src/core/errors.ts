// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `request-telemetry/core/errors`
 * Purpose: Error classes for the contained failure kinds of the instrumentation subsystem.
 * Scope: Error definitions and type guards. Does not perform IO or decide propagation.
 * Invariants: All errors have a readonly `code` discriminant for type guards. Handler errors are never wrapped by these.
 * Side-effects: none
 * @public
 */

import type { ZodIssue } from "zod";

export class StorageWriteError extends Error {
  public readonly code = "STORAGE_WRITE_FAILED" as const;
  constructor(
    public readonly target: string,
    public override readonly cause: unknown
  ) {
    super(
      `Storage write to ${target} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = "StorageWriteError";
  }
}

export class StorageTimeoutError extends Error {
  public readonly code = "STORAGE_WRITE_TIMEOUT" as const;
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number
  ) {
    super(`Storage write to ${target} exceeded ${timeoutMs}ms`);
    this.name = "StorageTimeoutError";
  }
}

export class CleanupError extends Error {
  public readonly code = "CONTEXT_CLEANUP_FAILED" as const;
  constructor(
    public readonly requestId: string,
    public override readonly cause: unknown
  ) {
    super(
      `Failed to release request context ${requestId}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = "CleanupError";
  }
}

export class ConfigValidationError extends Error {
  public readonly code = "INVALID_CONFIG" as const;
  constructor(public readonly issues: readonly ZodIssue[]) {
    super(
      `Invalid telemetry configuration:\n${issues
        .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("\n")}`
    );
    this.name = "ConfigValidationError";
  }
}

// Type guards

export function isStorageWriteError(
  error: unknown
): error is StorageWriteError {
  return error instanceof Error && error.name === "StorageWriteError";
}

export function isStorageTimeoutError(
  error: unknown
): error is StorageTimeoutError {
  return error instanceof Error && error.name === "StorageTimeoutError";
}

export function isCleanupError(error: unknown): error is CleanupError {
  return error instanceof Error && error.name === "CleanupError";
}

export function isConfigValidationError(
  error: unknown
): error is ConfigValidationError {
  return error instanceof Error && error.name === "ConfigValidationError";
}

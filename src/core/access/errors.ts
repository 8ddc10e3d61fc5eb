// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/access/errors`
 * Purpose: Domain errors for privileged access and single-entry guarding.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import { LedgerDomainError } from "../errors";

export class UnauthorizedError extends LedgerDomainError {
  public readonly code = "UNAUTHORIZED" as const;
  constructor(
    public readonly action: string,
    public readonly caller: string
  ) {
    super(`${caller} is not authorized for ${action}`);
    this.name = "UnauthorizedError";
  }
}

export class ReentrantCallError extends LedgerDomainError {
  public readonly code = "REENTRANT_CALL" as const;
  constructor(
    public readonly operation: string,
    public readonly activeOperation: string
  ) {
    super(`${operation} cannot run while ${activeOperation} is in progress`);
    this.name = "ReentrantCallError";
  }
}

export function isUnauthorizedError(
  error: unknown
): error is UnauthorizedError {
  return error instanceof Error && error.name === "UnauthorizedError";
}

export function isReentrantCallError(
  error: unknown
): error is ReentrantCallError {
  return error instanceof Error && error.name === "ReentrantCallError";
}

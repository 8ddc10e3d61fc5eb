// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/charities/errors`
 * Purpose: Domain errors for charity registration and verification.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import { LedgerDomainError } from "../errors";

export class CharityNotRegisteredError extends LedgerDomainError {
  public readonly code = "CHARITY_NOT_REGISTERED" as const;
  constructor(public readonly charityId: string) {
    super(`Charity ${charityId} is not registered`);
    this.name = "CharityNotRegisteredError";
  }
}

export class CharityNotVerifiedError extends LedgerDomainError {
  public readonly code = "CHARITY_NOT_VERIFIED" as const;
  constructor(public readonly charityId: string) {
    super(`Charity ${charityId} is not verified`);
    this.name = "CharityNotVerifiedError";
  }
}

export class CharityAlreadyRegisteredError extends LedgerDomainError {
  public readonly code = "CHARITY_ALREADY_REGISTERED" as const;
  constructor(public readonly charityId: string) {
    super(`Charity ${charityId} is already registered`);
    this.name = "CharityAlreadyRegisteredError";
  }
}

export class CharityAlreadyVerifiedError extends LedgerDomainError {
  public readonly code = "ALREADY_VERIFIED" as const;
  constructor(public readonly charityId: string) {
    super(`Charity ${charityId} is already verified`);
    this.name = "CharityAlreadyVerifiedError";
  }
}

// Type guards

export function isCharityNotRegisteredError(
  error: unknown
): error is CharityNotRegisteredError {
  return error instanceof Error && error.name === "CharityNotRegisteredError";
}

export function isCharityNotVerifiedError(
  error: unknown
): error is CharityNotVerifiedError {
  return error instanceof Error && error.name === "CharityNotVerifiedError";
}

export function isCharityAlreadyRegisteredError(
  error: unknown
): error is CharityAlreadyRegisteredError {
  return (
    error instanceof Error && error.name === "CharityAlreadyRegisteredError"
  );
}

export function isCharityAlreadyVerifiedError(
  error: unknown
): error is CharityAlreadyVerifiedError {
  return error instanceof Error && error.name === "CharityAlreadyVerifiedError";
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/donations/errors`
 * Purpose: Domain errors for donation input and value movement.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import { LedgerDomainError } from "../errors";

export class InvalidAmountError extends LedgerDomainError {
  public readonly code = "INVALID_AMOUNT" as const;
  constructor(public readonly amount: string) {
    super(`Amount must be a positive integer, got ${amount}`);
    this.name = "InvalidAmountError";
  }
}

/**
 * External value movement reported failure or threw.
 * `reason` carries the adapter's message; the underlying error, if any, is `cause`.
 */
export class TransferFailedError extends LedgerDomainError {
  public readonly code = "TRANSFER_FAILED" as const;
  constructor(
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Value transfer failed: ${reason}`, options);
    this.name = "TransferFailedError";
  }

  /** Wraps an error thrown by the transfer primitive */
  static fromError(error: unknown): TransferFailedError {
    const reason = error instanceof Error ? error.message : String(error);
    return new TransferFailedError(reason, { cause: error });
  }
}

export function isInvalidAmountError(
  error: unknown
): error is InvalidAmountError {
  return error instanceof Error && error.name === "InvalidAmountError";
}

export function isTransferFailedError(
  error: unknown
): error is TransferFailedError {
  return error instanceof Error && error.name === "TransferFailedError";
}

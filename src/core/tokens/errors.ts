// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/tokens/errors`
 * Purpose: Domain errors for identity validation and token whitelisting.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import { LedgerDomainError } from "../errors";

export class InvalidAddressError extends LedgerDomainError {
  public readonly code = "INVALID_ADDRESS" as const;
  constructor(
    public readonly field: string,
    public readonly value: string
  ) {
    super(`Invalid address for ${field}: "${value}"`);
    this.name = "InvalidAddressError";
  }
}

export class TokenNotSupportedError extends LedgerDomainError {
  public readonly code = "TOKEN_NOT_SUPPORTED" as const;
  constructor(public readonly tokenId: string) {
    super(`Token ${tokenId} is not accepted for donations`);
    this.name = "TokenNotSupportedError";
  }
}

export function isInvalidAddressError(
  error: unknown
): error is InvalidAddressError {
  return error instanceof Error && error.name === "InvalidAddressError";
}

export function isTokenNotSupportedError(
  error: unknown
): error is TokenNotSupportedError {
  return error instanceof Error && error.name === "TokenNotSupportedError";
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/reputation/errors`
 * Purpose: Domain errors for credential issuance, lookup and ownership.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import { LedgerDomainError } from "../errors";

/**
 * Thrown for every ownership change where both endpoints are set.
 * Mint (from = null) is the only ownership change the issuer performs.
 */
export class TokenNotTransferableError extends LedgerDomainError {
  public readonly code = "TOKEN_NOT_TRANSFERABLE" as const;
  constructor(
    public readonly credentialId: bigint,
    public readonly from: string,
    public readonly to: string
  ) {
    super(
      `Reputation credential ${credentialId} cannot move from ${from} to ${to}`
    );
    this.name = "TokenNotTransferableError";
  }
}

export class TokenAlreadyMintedError extends LedgerDomainError {
  public readonly code = "TOKEN_ALREADY_MINTED" as const;
  constructor(
    public readonly donor: string,
    public readonly existingCredentialId: bigint
  ) {
    super(
      `Donor ${donor} already holds reputation credential ${existingCredentialId}`
    );
    this.name = "TokenAlreadyMintedError";
  }
}

export class CredentialNotFoundError extends LedgerDomainError {
  public readonly code = "CREDENTIAL_NOT_FOUND" as const;
  constructor(public readonly lookup: string) {
    super(`No reputation credential for ${lookup}`);
    this.name = "CredentialNotFoundError";
  }
}

export class InvalidMetadataError extends LedgerDomainError {
  public readonly code = "INVALID_METADATA" as const;
  constructor(
    public readonly field: string,
    public readonly maxChars: number
  ) {
    super(`${field} exceeds ${maxChars} characters`);
    this.name = "InvalidMetadataError";
  }
}

// Type guards

export function isTokenNotTransferableError(
  error: unknown
): error is TokenNotTransferableError {
  return error instanceof Error && error.name === "TokenNotTransferableError";
}

export function isTokenAlreadyMintedError(
  error: unknown
): error is TokenAlreadyMintedError {
  return error instanceof Error && error.name === "TokenAlreadyMintedError";
}

export function isCredentialNotFoundError(
  error: unknown
): error is CredentialNotFoundError {
  return error instanceof Error && error.name === "CredentialNotFoundError";
}

export function isInvalidMetadataError(
  error: unknown
): error is InvalidMetadataError {
  return error instanceof Error && error.name === "InvalidMetadataError";
}

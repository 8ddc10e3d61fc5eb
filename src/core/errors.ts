// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/errors`
 * Purpose: Base class and code registry shared by every ledger domain error.
 * Scope: Error code union and base class. Does not define concrete errors (see each domain's errors module).
 * Invariants: Every concrete error has a readonly `code` from LEDGER_ERROR_CODES and a stable `name`.
 * Side-effects: none
 * Links: src/core/<domain>/errors.ts
 * @public
 */

export const LEDGER_ERROR_CODES = [
  "INVALID_AMOUNT",
  "CHARITY_NOT_REGISTERED",
  "CHARITY_NOT_VERIFIED",
  "CHARITY_ALREADY_REGISTERED",
  "ALREADY_VERIFIED",
  "TOKEN_NOT_SUPPORTED",
  "TOKEN_NOT_TRANSFERABLE",
  "TOKEN_ALREADY_MINTED",
  "INVALID_METADATA",
  "INVALID_ADDRESS",
  "TRANSFER_FAILED",
  "CREDENTIAL_NOT_FOUND",
  "UNAUTHORIZED",
  "REENTRANT_CALL",
] as const;

export type LedgerErrorCode = (typeof LEDGER_ERROR_CODES)[number];

/**
 * Base for all ledger domain errors.
 * Callers narrow with isLedgerDomainError() and branch on `code`.
 */
export abstract class LedgerDomainError extends Error {
  abstract readonly code: LedgerErrorCode;
}

export function isLedgerDomainError(
  error: unknown
): error is LedgerDomainError {
  return error instanceof LedgerDomainError;
}

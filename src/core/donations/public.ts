// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/donations/public`
 * Purpose: Public API for the donation ledger domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export {
  InvalidAmountError,
  isInvalidAmountError,
  isTransferFailedError,
  TransferFailedError,
} from "./errors";
export type { DonateParams, DonationRecord } from "./model";
export {
  assertValidAmount,
  assertValidMessage,
  isValidAmount,
  MAX_DONATION_MESSAGE_CHARS,
} from "./rules";

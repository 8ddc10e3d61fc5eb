// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/donations/rules`
 * Purpose: Input validation for donations and fund movements.
 * Scope: Pure functions. Does not perform I/O.
 * Invariants: Amounts must be strictly positive bigints.
 * Side-effects: none
 * @public
 */

import { InvalidMetadataError } from "../reputation/errors";
import { InvalidAmountError } from "./errors";

export const MAX_DONATION_MESSAGE_CHARS = 1024;

export function isValidAmount(amount: bigint): boolean {
  return amount > 0n;
}

/** @throws InvalidAmountError when amount is zero or negative */
export function assertValidAmount(amount: bigint): void {
  if (!isValidAmount(amount)) {
    throw new InvalidAmountError(amount.toString());
  }
}

/** @throws InvalidMetadataError when message exceeds MAX_DONATION_MESSAGE_CHARS */
export function assertValidMessage(message: string): void {
  if (message.length > MAX_DONATION_MESSAGE_CHARS) {
    throw new InvalidMetadataError("message", MAX_DONATION_MESSAGE_CHARS);
  }
}

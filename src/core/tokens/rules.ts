// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/tokens/rules`
 * Purpose: Address normalisation for every identity the ledger stores or compares.
 * Scope: Pure validation functions. Does not perform I/O.
 * Invariants: Returned addresses are checksummed and never the zero address.
 * Side-effects: none
 * Links: https://viem.sh/docs/utilities/getAddress
 * @public
 */

import { getAddress, isAddress, zeroAddress } from "viem";

import { InvalidAddressError } from "./errors";
import {
  type Address,
  NATIVE_ASSET,
  type WithdrawalAsset,
} from "./model";

/**
 * Returns the checksummed form of `value`, or null when it is not a usable identity.
 * The zero address counts as unusable.
 */
export function tryNormalizeAddress(value: string): Address | null {
  const trimmed = value.trim();
  if (!isAddress(trimmed, { strict: false })) return null;
  const checksummed = getAddress(trimmed);
  if (checksummed === zeroAddress) return null;
  return checksummed;
}

/**
 * @param field - Name reported in the error (e.g. "charityId")
 * @throws InvalidAddressError when value is malformed or the zero address
 */
export function normalizeAddress(value: string, field: string): Address {
  const address = tryNormalizeAddress(value);
  if (!address) {
    throw new InvalidAddressError(field, value);
  }
  return address;
}

export function normalizeWithdrawalAsset(
  value: string,
  field: string
): WithdrawalAsset {
  if (value === NATIVE_ASSET) return NATIVE_ASSET;
  return normalizeAddress(value, field);
}


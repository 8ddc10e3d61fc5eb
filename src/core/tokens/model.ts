// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/tokens/model`
 * Purpose: Identity and token-support types for the donation ledger.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants: Address values are checksummed; the zero address never appears as a stored identity.
 * Side-effects: none
 * @public
 */

/** Checksummed EVM address used for charities, donors, tokens and recipients */
export type Address = `0x${string}`;

/** Literal used by fund recovery to address the chain's native asset */
export const NATIVE_ASSET = "native" as const;
export type NativeAsset = typeof NATIVE_ASSET;

/** Asset moved by emergency withdrawal: an ERC-20 token or the native asset */
export type WithdrawalAsset = Address | NativeAsset;

export interface TokenSupportEntry {
  readonly tokenId: Address;
  readonly supported: boolean;
  readonly updatedAt: Date;
}

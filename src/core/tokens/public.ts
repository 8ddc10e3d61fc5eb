// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/tokens/public`
 * Purpose: Public API for the token-support and identity domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export {
  InvalidAddressError,
  isInvalidAddressError,
  isTokenNotSupportedError,
  TokenNotSupportedError,
} from "./errors";
export type {
  Address,
  NativeAsset,
  TokenSupportEntry,
  WithdrawalAsset,
} from "./model";
export { NATIVE_ASSET } from "./model";
export {
  normalizeAddress,
  normalizeWithdrawalAsset,
  tryNormalizeAddress,
} from "./rules";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features via \@/core alias
 * @public
 */

export type {
  AccessPolicy,
  AccessPolicyConfig,
  AccessPolicyKind,
  CallerContext,
  PrivilegedAction,
} from "./access/public";
export {
  assertAuthorized,
  createAccessPolicy,
  isReentrantCallError,
  isUnauthorizedError,
  ReentrantCallError,
  UnauthorizedError,
} from "./access/public";
export type {
  Charity,
  CharityContribution,
  RegisterCharityParams,
} from "./charities/public";
export {
  applyContribution,
  CharityAlreadyRegisteredError,
  CharityAlreadyVerifiedError,
  CharityNotRegisteredError,
  CharityNotVerifiedError,
  createCharity,
  isCharityAlreadyRegisteredError,
  isCharityAlreadyVerifiedError,
  isCharityNotRegisteredError,
  isCharityNotVerifiedError,
  MAX_CHARITY_DESCRIPTION_CHARS,
  MAX_CHARITY_NAME_CHARS,
  MAX_METADATA_POINTER_CHARS,
  markVerified,
  validateRegistration,
} from "./charities/public";
export type { DonateParams, DonationRecord } from "./donations/public";
export {
  assertValidAmount,
  assertValidMessage,
  InvalidAmountError,
  isInvalidAmountError,
  isTransferFailedError,
  isValidAmount,
  MAX_DONATION_MESSAGE_CHARS,
  TransferFailedError,
} from "./donations/public";
export type { LedgerErrorCode } from "./errors";
export {
  isLedgerDomainError,
  LEDGER_ERROR_CODES,
  LedgerDomainError,
} from "./errors";
export type { LedgerEvent, LedgerEventType } from "./events/public";
export type {
  CredentialDescriptor,
  ReputationCredential,
  ReputationTier,
} from "./reputation/public";
export {
  applyDonation,
  assertOwnershipChange,
  buildCredentialDescriptor,
  computeTier,
  CredentialNotFoundError,
  createCredential,
  DESCRIPTOR_URI_PREFIX,
  describeCredential,
  InvalidMetadataError,
  isCredentialNotFoundError,
  isInvalidMetadataError,
  isTokenAlreadyMintedError,
  isTokenNotTransferableError,
  REPUTATION_TIERS,
  TIER_THRESHOLDS,
  TokenAlreadyMintedError,
  TokenNotTransferableError,
} from "./reputation/public";
export type {
  Address,
  NativeAsset,
  TokenSupportEntry,
  WithdrawalAsset,
} from "./tokens/public";
export {
  InvalidAddressError,
  isInvalidAddressError,
  isTokenNotSupportedError,
  NATIVE_ASSET,
  normalizeAddress,
  normalizeWithdrawalAsset,
  TokenNotSupportedError,
  tryNormalizeAddress,
} from "./tokens/public";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/reputation/public`
 * Purpose: Public API for the reputation credential domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export type { CredentialDescriptor } from "./descriptor";
export {
  buildCredentialDescriptor,
  DESCRIPTOR_URI_PREFIX,
  describeCredential,
} from "./descriptor";
export {
  CredentialNotFoundError,
  InvalidMetadataError,
  isCredentialNotFoundError,
  isInvalidMetadataError,
  isTokenAlreadyMintedError,
  isTokenNotTransferableError,
  TokenAlreadyMintedError,
  TokenNotTransferableError,
} from "./errors";
export type { ReputationCredential, ReputationTier } from "./model";
export { REPUTATION_TIERS } from "./model";
export {
  applyDonation,
  assertOwnershipChange,
  computeTier,
  createCredential,
  TIER_THRESHOLDS,
} from "./rules";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `charity-ledger`
 * Purpose: Package entry point.
 * Scope: Re-exports the ledger facade, its composition root, domain types and error guards. Does not start anything.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export {
  type Container,
  getContainer,
  resetContainer,
} from "./bootstrap/container";
export type {
  AccessPolicyConfig,
  Address,
  CallerContext,
  Charity,
  DonationRecord,
  LedgerErrorCode,
  LedgerEvent,
  PrivilegedAction,
  ReputationCredential,
  ReputationTier,
} from "./core/public";
export {
  computeTier,
  isLedgerDomainError,
  LEDGER_ERROR_CODES,
  LedgerDomainError,
  NATIVE_ASSET,
  REPUTATION_TIERS,
  TIER_THRESHOLDS,
} from "./core/public";
export {
  type AccessPolicy,
  createAccessPolicy,
  createDonationLedger,
  type DonationLedger,
  type DonationLedgerDeps,
  type ReadContextInput,
  ReentrancyGuard,
} from "./features/ledger/public";
export type {
  Clock,
  EventPublisher,
  LedgerReader,
  LedgerStore,
  LedgerWriter,
  TransferResult,
  ValueTransferPort,
} from "./ports";

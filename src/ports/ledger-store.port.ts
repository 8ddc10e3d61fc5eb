// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/ledger-store`
 * Purpose: Persistence port for token support, charities, contributions, donations and credentials.
 * Scope: Defines the read surface and the transactional write surface. Does not contain business rules.
 * Invariants:
 * - All writes go through transaction(); a throw inside the callback rolls back every write.
 * - Donation ids come from nextDonationId() and are never reused, even after rollback.
 * - Credential ids come from nextCredentialId() and start at 1.
 * - No method changes a credential's donor; updateCredential keys on id and ignores ownership.
 * - Conditional writes (insertCharity, markCharityVerified) are decided against committed state:
 *   of two concurrent transactions making the same change, exactly one commits it.
 * - Index lists are returned in ascending id order.
 * Side-effects: none (interface definition only)
 * Links: DrizzleLedgerStore (server), InMemoryLedgerStore (test)
 * @public
 */

import type {
  Address,
  Charity,
  DonationRecord,
  ReputationCredential,
  TokenSupportEntry,
} from "@/core";

/** Read-only view; usable outside and inside a transaction */
export interface LedgerReader {
  getTokenSupport(tokenId: Address): Promise<TokenSupportEntry | null>;
  findCharity(charityId: Address): Promise<Charity | null>;
  /** Cumulative amount donated by donor to charity; 0n when none */
  getContribution(charityId: Address, donor: Address): Promise<bigint>;
  findDonation(donationId: bigint): Promise<DonationRecord | null>;
  listDonationIdsByCharity(charityId: Address): Promise<bigint[]>;
  listDonationIdsByDonor(donor: Address): Promise<bigint[]>;
  findCredentialByDonor(donor: Address): Promise<ReputationCredential | null>;
  findCredentialById(credentialId: bigint): Promise<ReputationCredential | null>;
}

export interface LedgerWriter extends LedgerReader {
  setTokenSupport(entry: TokenSupportEntry): Promise<void>;
  /** @returns false when a charity with this id already exists; the existing row is left untouched */
  insertCharity(charity: Charity): Promise<boolean>;
  /** Flips verified on an unverified charity; false when it is absent or already verified */
  markCharityVerified(charityId: Address, updatedAt: Date): Promise<boolean>;
  /** Replaces aggregates and updatedAt of an existing charity */
  updateCharity(charity: Charity): Promise<void>;
  upsertContribution(
    charityId: Address,
    donor: Address,
    amount: bigint
  ): Promise<void>;
  nextDonationId(): Promise<bigint>;
  insertDonation(record: DonationRecord): Promise<void>;
  nextCredentialId(): Promise<bigint>;
  insertCredential(credential: ReputationCredential): Promise<void>;
  /** Replaces totals, count, tier and lastDonationAt; donor is never written */
  updateCredential(credential: ReputationCredential): Promise<void>;
}

export interface LedgerStore extends LedgerReader {
  transaction<T>(fn: (tx: LedgerWriter) => Promise<T>): Promise<T>;
}

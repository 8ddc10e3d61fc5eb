// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/reputation/model`
 * Purpose: Donor reputation credential entity and tier enumeration.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants:
 * - At most one credential per donor; donor is fixed at mint (non-transferable).
 * - totalDonations is monotonically non-decreasing.
 * - tier is always computeTier(totalDonations).
 * Side-effects: none
 * @public
 */

import type { Address } from "../tokens/model";

/** Ordered lowest → highest; index is the tier rank */
export const REPUTATION_TIERS = [
  "Bronze",
  "Silver",
  "Gold",
  "Platinum",
  "Diamond",
] as const;
export type ReputationTier = (typeof REPUTATION_TIERS)[number];

export interface ReputationCredential {
  /** Credential id, assigned from 1 upward */
  readonly id: bigint;
  readonly donor: Address;
  readonly totalDonations: bigint;
  readonly donationCount: number;
  readonly tier: ReputationTier;
  /** Null until the first donation is applied */
  readonly lastDonationAt: Date | null;
  /** Opaque pointer into the off-system metadata store; empty when unset */
  readonly metadataPointer: string;
  readonly mintedAt: Date;
}

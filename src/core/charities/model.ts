// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/charities/model`
 * Purpose: Charity registry entities.
 * Scope: Pure domain types. Does not handle persistence.
 * Invariants:
 * - A charity's id is the registering identity and never changes.
 * - verified moves false → true only (Registered → Verified, terminal).
 * - Per-donor contributions live in their own (charityId, donor) relation, not on the charity.
 * - All aggregates are bigint base units.
 * Side-effects: none
 * @public
 */

import type { Address } from "../tokens/model";

export interface Charity {
  /** Registering identity; doubles as the payout address */
  readonly id: Address;
  readonly name: string;
  readonly description: string;
  /** Opaque pointer into the off-system metadata store */
  readonly metadataPointer: string;
  readonly verified: boolean;
  /** Sum of every recorded donation, base units */
  readonly totalDonations: bigint;
  /** Number of distinct donors with a non-zero contribution */
  readonly donorCount: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface CharityContribution {
  readonly charityId: Address;
  readonly donor: Address;
  readonly amount: bigint;
}

export interface RegisterCharityParams {
  readonly name: string;
  readonly description: string;
  readonly metadataPointer: string;
}

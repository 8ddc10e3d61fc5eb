// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/reputation/rules`
 * Purpose: Tier thresholds, credential state transitions and the non-transferability rule.
 * Scope: Pure functions with no side effects. Does not perform I/O.
 * Invariants:
 * - Thresholds are inclusive lower bounds, evaluated highest first.
 * - applyDonation never lowers totalDonations and always recomputes tier.
 * - assertOwnershipChange rejects every change with both endpoints set.
 * Side-effects: none
 * @public
 */

import type { Address } from "../tokens/model";
import { TokenNotTransferableError } from "./errors";
import type { ReputationCredential, ReputationTier } from "./model";

/** Inclusive lower bounds in base units, highest first */
export const TIER_THRESHOLDS: ReadonlyArray<{
  readonly tier: ReputationTier;
  readonly minTotal: bigint;
}> = [
  { tier: "Diamond", minTotal: 10_000n },
  { tier: "Platinum", minTotal: 5_000n },
  { tier: "Gold", minTotal: 1_000n },
  { tier: "Silver", minTotal: 500n },
];

export function computeTier(totalDonations: bigint): ReputationTier {
  for (const { tier, minTotal } of TIER_THRESHOLDS) {
    if (totalDonations >= minTotal) return tier;
  }
  return "Bronze";
}

/**
 * Single enforcement point for credential ownership.
 * null endpoints mean mint (from) or burn (to); anything else is a transfer.
 */
export function assertOwnershipChange(
  from: Address | null,
  to: Address | null,
  credentialId: bigint
): void {
  if (from !== null && to !== null) {
    throw new TokenNotTransferableError(credentialId, from, to);
  }
}

export function createCredential(
  id: bigint,
  donor: Address,
  metadataPointer: string,
  now: Date
): ReputationCredential {
  assertOwnershipChange(null, donor, id);
  return {
    id,
    donor,
    totalDonations: 0n,
    donationCount: 0,
    tier: computeTier(0n),
    lastDonationAt: null,
    metadataPointer,
    mintedAt: now,
  };
}

export function applyDonation(
  credential: ReputationCredential,
  amount: bigint,
  now: Date
): ReputationCredential {
  const totalDonations = credential.totalDonations + amount;
  return {
    ...credential,
    totalDonations,
    donationCount: credential.donationCount + 1,
    tier: computeTier(totalDonations),
    lastDonationAt: now,
  };
}

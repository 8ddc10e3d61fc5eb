// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/events/model`
 * Purpose: Domain events emitted by ledger operations.
 * Scope: Discriminated union of event payloads. Does not publish anything.
 * Invariants:
 * - Events describe committed state only; they are published after the store commits.
 * - `type` is the discriminant and matches the observability EVENT_NAMES registry.
 * Side-effects: none
 * @public
 */

import type { ReputationTier } from "../reputation/model";
import type { Address, WithdrawalAsset } from "../tokens/model";

export type LedgerEvent =
  | {
      readonly type: "token.support_changed";
      readonly tokenId: Address;
      readonly supported: boolean;
    }
  | {
      readonly type: "charity.registered";
      readonly charityId: Address;
      readonly name: string;
      readonly metadataPointer: string;
    }
  | { readonly type: "charity.verified"; readonly charityId: Address }
  | {
      readonly type: "donation.made";
      readonly donationId: bigint;
      readonly donor: Address;
      readonly charityId: Address;
      readonly tokenId: Address;
      readonly amount: bigint;
      readonly message: string;
      readonly createdAt: Date;
    }
  | {
      readonly type: "credential.minted";
      readonly credentialId: bigint;
      readonly donor: Address;
      readonly tier: ReputationTier;
    }
  | {
      readonly type: "credential.updated";
      readonly credentialId: bigint;
      readonly donor: Address;
      readonly totalDonations: bigint;
      readonly donationCount: number;
      readonly tier: ReputationTier;
    }
  | {
      readonly type: "funds.emergency_withdrawn";
      readonly asset: WithdrawalAsset;
      readonly to: Address;
      readonly amount: bigint;
      readonly txHash: string;
    };

export type LedgerEventType = LedgerEvent["type"];

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/donations/model`
 * Purpose: Append-only donation record.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants:
 * - Records are immutable once stored.
 * - ids strictly increase from 0 and are never reused.
 * - amount > 0; tokenId was supported and charity verified when the record was written.
 * Side-effects: none
 * @public
 */

import type { Address } from "../tokens/model";

export interface DonationRecord {
  readonly id: bigint;
  readonly donor: Address;
  readonly charityId: Address;
  readonly amount: bigint;
  readonly tokenId: Address;
  readonly message: string;
  readonly createdAt: Date;
}

export interface DonateParams {
  readonly charityId: Address;
  readonly tokenId: Address;
  readonly amount: bigint;
  readonly message: string;
}

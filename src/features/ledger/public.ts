// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/public`
 * Purpose: Public surface of the donation ledger feature.
 * Scope: Barrel export. Does not expose services directly.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export { type AccessPolicy, createAccessPolicy } from "@/core";
export {
  createDonationLedger,
  type DonationLedger,
  type DonationLedgerDeps,
  type ReadContextInput,
} from "./ledger.facade";
export { ReentrancyGuard } from "./services/reentrancyGuard";

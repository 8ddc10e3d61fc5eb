// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export type { EventPublisher } from "./event-publisher.port";
export type {
  LedgerReader,
  LedgerStore,
  LedgerWriter,
} from "./ledger-store.port";
export type {
  TransferFromParams,
  TransferParams,
  TransferResult,
  ValueTransferPort,
} from "./value-transfer.port";

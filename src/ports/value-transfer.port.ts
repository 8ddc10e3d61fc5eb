// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/value-transfer`
 * Purpose: External value-movement primitive (token transferFrom/transfer, native send).
 * Scope: Interface only. Does not validate business rules or touch ledger state.
 * Invariants:
 * - A resolved { ok: false } and a rejected promise both mean no value moved.
 * - Callers treat both as TransferFailed; adapters never retry.
 * Side-effects: none (interface definition only)
 * Links: ViemValueTransferAdapter (server), FakeValueTransferAdapter (test)
 * @public
 */

import type { Address, WithdrawalAsset } from "@/core";

export type TransferResult =
  | { readonly ok: true; readonly txHash: string }
  | { readonly ok: false; readonly reason: string };

export interface TransferFromParams {
  readonly token: Address;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface TransferParams {
  readonly asset: WithdrawalAsset;
  readonly to: Address;
  readonly amount: bigint;
}

export interface ValueTransferPort {
  /** Moves `amount` of `token` from a donor who pre-approved the operator */
  transferFrom(params: TransferFromParams): Promise<TransferResult>;
  /** Moves funds held by the operator itself */
  transfer(params: TransferParams): Promise<TransferResult>;
}

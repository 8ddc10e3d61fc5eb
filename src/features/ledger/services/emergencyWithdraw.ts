// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/emergencyWithdraw`
 * Purpose: Recovery of operator-held funds to a chosen address.
 * Scope: Input checks, one outgoing transfer, one event. Does not touch ledger records; does not authorize or guard (facade does).
 * Invariants: asset is a token address or "native"; amount > 0; transfer failure surfaces as TransferFailed.
 * Side-effects: IO (via ValueTransferPort)
 * @public
 */

import {
  assertValidAmount,
  normalizeAddress,
  normalizeWithdrawalAsset,
  TransferFailedError,
} from "@/core";
import type { TransferResult, ValueTransferPort } from "@/ports";

import type { LedgerTx } from "./unitOfWork";

export async function emergencyWithdraw(
  scope: LedgerTx,
  transfers: ValueTransferPort,
  input: { asset: string; to: string; amount: bigint }
): Promise<{ txHash: string }> {
  const asset = normalizeWithdrawalAsset(input.asset, "asset");
  const to = normalizeAddress(input.to, "to");
  assertValidAmount(input.amount);

  let result: TransferResult;
  try {
    result = await transfers.transfer({ asset, to, amount: input.amount });
  } catch (error) {
    throw TransferFailedError.fromError(error);
  }
  if (!result.ok) {
    throw new TransferFailedError(result.reason);
  }

  scope.emit({
    type: "funds.emergency_withdrawn",
    asset,
    to,
    amount: input.amount,
    txHash: result.txHash,
  });
  return { txHash: result.txHash };
}

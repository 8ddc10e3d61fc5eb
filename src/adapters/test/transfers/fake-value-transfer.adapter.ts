// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/transfers/fake-value-transfer`
 * Purpose: Fake value-transfer primitive for deterministic testing.
 * Scope: Records every call and returns a configurable outcome. Does not move value.
 * Invariants: Deterministic tx hashes (0x-prefixed, sequential); onTransfer runs before the outcome is returned.
 * Side-effects: none (in-memory only)
 * Notes: Configure via succeed()/fail()/throwOnTransfer(); onTransfer lets tests re-enter the ledger mid-transfer.
 * Links: Implements ValueTransferPort
 * @public
 */

import { pad, toHex } from "viem";

import type {
  TransferFromParams,
  TransferParams,
  TransferResult,
  ValueTransferPort,
} from "@/ports";

export type RecordedTransfer =
  | ({ kind: "transferFrom" } & TransferFromParams)
  | ({ kind: "transfer" } & TransferParams);

type Outcome =
  | { mode: "succeed" }
  | { mode: "fail"; reason: string }
  | { mode: "throw"; error: Error };

export class FakeValueTransferAdapter implements ValueTransferPort {
  private outcome: Outcome = { mode: "succeed" };
  private sequence = 0n;

  public readonly calls: RecordedTransfer[] = [];

  /** Awaited inside every transfer, before the outcome is produced */
  public onTransfer: ((call: RecordedTransfer) => Promise<void>) | undefined;

  succeed(): void {
    this.outcome = { mode: "succeed" };
  }

  /** Resolve { ok: false } */
  fail(reason = "insufficient allowance"): void {
    this.outcome = { mode: "fail", reason };
  }

  /** Reject with `error` */
  throwOnTransfer(error: Error = new Error("rpc unavailable")): void {
    this.outcome = { mode: "throw", error };
  }

  reset(): void {
    this.outcome = { mode: "succeed" };
    this.sequence = 0n;
    this.calls.length = 0;
    this.onTransfer = undefined;
  }

  transferFrom(params: TransferFromParams): Promise<TransferResult> {
    return this.run({ kind: "transferFrom", ...params });
  }

  transfer(params: TransferParams): Promise<TransferResult> {
    return this.run({ kind: "transfer", ...params });
  }

  private async run(call: RecordedTransfer): Promise<TransferResult> {
    this.calls.push(call);
    if (this.onTransfer) {
      await this.onTransfer(call);
    }
    switch (this.outcome.mode) {
      case "succeed":
        this.sequence += 1n;
        return { ok: true, txHash: pad(toHex(this.sequence), { size: 32 }) };
      case "fail":
        return { ok: false, reason: this.outcome.reason };
      case "throw":
        throw this.outcome.error;
    }
  }
}

// ============================================================================
// Test Singleton Accessor (APP_ENV=test only)
// ============================================================================

let _testInstance: FakeValueTransferAdapter | null = null;

/** Shared instance wired by the container in test mode; tests configure it directly */
export function getTestValueTransfer(): FakeValueTransferAdapter {
  if (!_testInstance) {
    _testInstance = new FakeValueTransferAdapter();
  }
  return _testInstance;
}

export function resetTestValueTransfer(): void {
  if (_testInstance) {
    _testInstance.reset();
  }
}

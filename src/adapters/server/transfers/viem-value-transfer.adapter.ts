// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/transfers/viem-value-transfer`
 * Purpose: Production ValueTransferPort using a viem wallet client signed by the operator key.
 * Scope: ERC20 transferFrom/transfer and native sends, each simulated, submitted and awaited to one receipt. Does not implement business logic.
 * Invariants:
 * - Every contract write is simulated first; a simulated revert resolves { ok: false } without submitting.
 * - ok: true only for a mined receipt with status "success".
 * - RPC errors are logged and rethrown; no retries.
 * Side-effects: IO (RPC calls to EVM node, signed transactions)
 * Links: src/ports/value-transfer.port.ts, src/shared/web3/erc20-abi.ts
 * @public
 */

import {
  type Account,
  type Chain,
  createPublicClient,
  createWalletClient,
  type Hash,
  http,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";

import type {
  TransferFromParams,
  TransferParams,
  TransferResult,
  ValueTransferPort,
} from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";
import { ERC20_ABI, resolveChain } from "@/shared/web3";

export interface ViemValueTransferConfig {
  rpcUrl: string;
  chainId: number;
  operatorPrivateKey: `0x${string}`;
  log: Logger;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    // viem BaseError carries a one-line summary
    return "shortMessage" in error && typeof error.shortMessage === "string"
      ? error.shortMessage
      : error.message;
  }
  return String(error);
}

export class ViemValueTransferAdapter implements ValueTransferPort {
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient: WalletClient<Transport, Chain, Account>;
  private readonly log: Logger;

  constructor(config: ViemValueTransferConfig) {
    const chain = resolveChain(config.chainId, config.rpcUrl);
    const transport = http(config.rpcUrl);
    this.publicClient = createPublicClient({ chain, transport });
    this.walletClient = createWalletClient({
      account: privateKeyToAccount(config.operatorPrivateKey),
      chain,
      transport,
    });
    this.log = config.log.child({ adapter: "viem-value-transfer" });
  }

  async transferFrom(params: TransferFromParams): Promise<TransferResult> {
    return this.submit("transferFrom", async () => {
      const { request } = await this.publicClient.simulateContract({
        account: this.walletClient.account,
        address: params.token,
        abi: ERC20_ABI,
        functionName: "transferFrom",
        args: [params.from, params.to, params.amount],
      });
      return this.walletClient.writeContract(request);
    });
  }

  async transfer(params: TransferParams): Promise<TransferResult> {
    const { asset } = params;
    if (asset === "native") {
      return this.submit("native", () =>
        this.walletClient.sendTransaction({
          to: params.to,
          value: params.amount,
        })
      );
    }
    return this.submit("transfer", async () => {
      const { request } = await this.publicClient.simulateContract({
        account: this.walletClient.account,
        address: asset,
        abi: ERC20_ABI,
        functionName: "transfer",
        args: [params.to, params.amount],
      });
      return this.walletClient.writeContract(request);
    });
  }

  private async submit(
    kind: "transferFrom" | "transfer" | "native",
    send: () => Promise<Hash>
  ): Promise<TransferResult> {
    let hash: Hash;
    try {
      hash = await send();
    } catch (error) {
      const reason = describe(error);
      // Simulation reverts are a definite "no value moved"
      if (
        error instanceof Error &&
        error.name === "ContractFunctionExecutionError"
      ) {
        return { ok: false, reason };
      }
      this.log.error(
        { event: EVENT_NAMES.ADAPTER_VIEM_TRANSFER_ERROR, kind, reason },
        "value transfer submission failed"
      );
      throw error;
    }

    this.log.info(
      { event: EVENT_NAMES.ADAPTER_VIEM_TRANSFER_SUBMITTED, kind, txHash: hash },
      "value transfer submitted"
    );

    const receipt = await this.publicClient.waitForTransactionReceipt({
      hash,
    });
    if (receipt.status !== "success") {
      return { ok: false, reason: `transaction ${hash} reverted` };
    }
    return { ok: true, txHash: hash };
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3/chain`
 * Purpose: Resolves the viem chain object for the configured CHAIN_ID.
 * Scope: Known chains come from viem/chains; any other id gets a minimal definition. Does not perform network calls.
 * Invariants: Single active chain per deployment.
 * Side-effects: none
 * @public
 */

import { type Chain, defineChain } from "viem";
import { base, baseSepolia, mainnet, sepolia } from "viem/chains";

const KNOWN_CHAINS: readonly Chain[] = [mainnet, sepolia, base, baseSepolia];

export function resolveChain(chainId: number, rpcUrl: string): Chain {
  const known = KNOWN_CHAINS.find((chain) => chain.id === chainId);
  if (known) return known;
  return defineChain({
    id: chainId,
    name: `chain-${chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [rpcUrl] } },
  });
}

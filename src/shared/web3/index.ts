// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/web3`
 * Purpose: Chain resolution and ABI fragments for the value-transfer adapter.
 * Scope: Barrel export.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export { resolveChain } from "./chain";
export { ERC20_ABI } from "./erc20-abi";

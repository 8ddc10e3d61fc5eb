// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/tokenSupport`
 * Purpose: Token support registry operations.
 * Scope: Whitelist writes and lookups. Does not check authorization (facade does).
 * Invariants: Unknown or malformed tokens read as unsupported.
 * Side-effects: IO (via LedgerStore)
 * @public
 */

import { normalizeAddress, type TokenSupportEntry, tryNormalizeAddress } from "@/core";
import type { LedgerReader } from "@/ports";

import type { LedgerTx } from "./unitOfWork";

export async function setTokenSupport(
  scope: LedgerTx,
  input: { tokenId: string; supported: boolean }
): Promise<TokenSupportEntry> {
  const entry: TokenSupportEntry = {
    tokenId: normalizeAddress(input.tokenId, "tokenId"),
    supported: input.supported,
    updatedAt: scope.now,
  };
  await scope.tx.setTokenSupport(entry);
  scope.emit({
    type: "token.support_changed",
    tokenId: entry.tokenId,
    supported: entry.supported,
  });
  return entry;
}

export async function isTokenSupported(
  reader: LedgerReader,
  tokenId: string
): Promise<boolean> {
  const address = tryNormalizeAddress(tokenId);
  if (!address) return false;
  const entry = await reader.getTokenSupport(address);
  return entry?.supported ?? false;
}

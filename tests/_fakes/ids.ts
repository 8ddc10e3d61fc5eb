// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/ids`
 * Purpose: Deterministic identities for ledger tests.
 * Scope: Address constants and a builder. Does not touch any store.
 * Invariants:
 * - Addresses are digits only, so their checksummed form equals the literal.
 * - None of them is the zero address.
 * Side-effects: none
 * @public
 */

import type { Address } from "@/core";

/** `testAddress(7)` → 0x0000…0007 */
export function testAddress(n: number): Address {
  return `0x${n.toString().padStart(40, "0")}`;
}

export const OWNER = testAddress(1);
export const SIGNER_A = testAddress(2);
export const SIGNER_B = testAddress(3);
export const SIGNER_C = testAddress(4);

export const DONOR_A = testAddress(101);
export const DONOR_B = testAddress(102);

export const CHARITY_A = testAddress(201);
export const CHARITY_B = testAddress(202);

export const TOKEN_A = testAddress(301);
export const TOKEN_B = testAddress(302);

export const RECOVERY = testAddress(401);

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ledger.tokens.v1.contract`
 * Purpose: Operation contracts for the token support registry.
 * Scope: Zod input schemas for setTokenSupport and isTokenSupported. Does not contain business logic.
 * Invariants: setTokenSupport is privileged (token.set_support); isTokenSupported never fails.
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import { IdentityInputSchema } from "./ledger.shared.v1.contract";

export const setTokenSupportOperation = {
  id: "ledger.tokens.set-support.v1",
  summary: "Whitelist or delist a donation token",
  input: z.object({
    tokenId: IdentityInputSchema,
    supported: z.boolean(),
  }),
  addressFields: ["tokenId"],
} as const;

export const isTokenSupportedOperation = {
  id: "ledger.tokens.is-supported.v1",
  summary: "Check whether a token is accepted for donations",
  input: z.object({ tokenId: z.string() }),
  addressFields: [],
} as const;

export type SetTokenSupportInput = z.input<
  typeof setTokenSupportOperation.input
>;
export type IsTokenSupportedInput = z.input<
  typeof isTokenSupportedOperation.input
>;

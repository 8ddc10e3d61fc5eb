// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ledger.charities.v1.contract`
 * Purpose: Operation contracts for the charity registry.
 * Scope: Zod input schemas for registration, verification and charity reads. Does not enforce length limits (core does).
 * Invariants:
 *   - registerCharity takes no charity id; the caller becomes the charity identity
 *   - Read inputs accept any string; malformed ids read as absent
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import { IdentityInputSchema } from "./ledger.shared.v1.contract";

export const registerCharityOperation = {
  id: "ledger.charities.register.v1",
  summary: "Register the caller as a charity",
  input: z.object({
    name: z.string(),
    description: z.string().default(""),
    metadataPointer: z.string(),
  }),
  addressFields: [],
} as const;

export const verifyCharityOperation = {
  id: "ledger.charities.verify.v1",
  summary: "Mark a registered charity as verified",
  input: z.object({ charityId: IdentityInputSchema }),
  addressFields: ["charityId"],
} as const;

export const getCharityOperation = {
  id: "ledger.charities.get.v1",
  summary: "Read a charity record",
  input: z.object({ charityId: z.string() }),
  addressFields: [],
} as const;

export const getCharityContributionOperation = {
  id: "ledger.charities.get-contribution.v1",
  summary: "Read a donor's cumulative contribution to a charity",
  input: z.object({ charityId: z.string(), donor: z.string() }),
  addressFields: [],
} as const;

export type RegisterCharityInput = z.input<
  typeof registerCharityOperation.input
>;
export type VerifyCharityInput = z.input<typeof verifyCharityOperation.input>;
export type GetCharityInput = z.input<typeof getCharityOperation.input>;
export type GetCharityContributionInput = z.input<
  typeof getCharityContributionOperation.input
>;

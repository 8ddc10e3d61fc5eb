// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ledger.donations.v1.contract`
 * Purpose: Operation contracts for the donation ledger.
 * Scope: Zod input schemas for donate and donation reads. Does not contain business logic.
 * Invariants:
 *   - ALL_MATH_BIGINT: amount parses to bigint; sign is checked in core (InvalidAmount)
 *   - Read inputs accept any string; malformed ids read as absent
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import {
  AmountInputSchema,
  IdentityInputSchema,
} from "./ledger.shared.v1.contract";

export const donateOperation = {
  id: "ledger.donations.donate.v1",
  summary: "Donate a whitelisted token to a verified charity",
  input: z.object({
    charityId: IdentityInputSchema,
    tokenId: IdentityInputSchema,
    amount: AmountInputSchema,
    message: z.string().default(""),
  }),
  addressFields: ["charityId", "tokenId"],
} as const;

export const getDonationOperation = {
  id: "ledger.donations.get.v1",
  summary: "Read a donation record by id",
  input: z.object({
    donationId: z.union([z.bigint(), z.string(), z.number()]),
  }),
  addressFields: [],
} as const;

export const getCharityDonationIdsOperation = {
  id: "ledger.donations.by-charity.v1",
  summary: "List donation ids received by a charity",
  input: z.object({ charityId: z.string() }),
  addressFields: [],
} as const;

export const getDonorDonationIdsOperation = {
  id: "ledger.donations.by-donor.v1",
  summary: "List donation ids made by a donor",
  input: z.object({ donor: z.string() }),
  addressFields: [],
} as const;

export type DonateInput = z.input<typeof donateOperation.input>;
export type GetDonationInput = z.input<typeof getDonationOperation.input>;
export type GetCharityDonationIdsInput = z.input<
  typeof getCharityDonationIdsOperation.input
>;
export type GetDonorDonationIdsInput = z.input<
  typeof getDonorDonationIdsOperation.input
>;

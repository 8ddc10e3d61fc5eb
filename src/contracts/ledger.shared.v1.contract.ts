// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ledger.shared.v1.contract`
 * Purpose: Schemas shared by every donation-ledger operation contract.
 * Scope: Caller context, identity and amount input shapes. Does not normalise addresses (domain does).
 * Invariants:
 *   - ALL_MATH_BIGINT: amounts and ids parse to bigint; numbers must be safe integers
 *   - Identity fields are strings here; checksum and null-identity checks happen in core
 * Side-effects: none
 * @public
 */

import { z } from "zod";

/** Any identity string; core rejects malformed and zero addresses */
export const IdentityInputSchema = z.string();

export const AmountInputSchema = z.union([
  z.bigint(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "Amount must be an integer")
    .transform((value) => BigInt(value)),
  z
    .number()
    .int()
    .refine(Number.isSafeInteger, "Amount exceeds safe integer range")
    .transform((value) => BigInt(value)),
]);

export const CallerContextSchema = z.object({
  caller: IdentityInputSchema,
  approvals: z.array(IdentityInputSchema).optional(),
  reqId: z.string().optional(),
});

export type CallerContextInput = z.input<typeof CallerContextSchema>;

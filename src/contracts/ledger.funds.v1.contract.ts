// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ledger.funds.v1.contract`
 * Purpose: Operation contract for emergency fund recovery.
 * Scope: Zod input schema. Does not contain business logic.
 * Invariants: asset is a token address or the literal "native"; privileged (funds.emergency_withdraw).
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import {
  AmountInputSchema,
  IdentityInputSchema,
} from "./ledger.shared.v1.contract";

export const emergencyWithdrawOperation = {
  id: "ledger.funds.emergency-withdraw.v1",
  summary: "Move operator-held funds to a recovery address",
  input: z.object({
    asset: IdentityInputSchema,
    to: IdentityInputSchema,
    amount: AmountInputSchema,
  }),
  addressFields: ["asset", "to"],
} as const;

export type EmergencyWithdrawInput = z.input<
  typeof emergencyWithdrawOperation.input
>;

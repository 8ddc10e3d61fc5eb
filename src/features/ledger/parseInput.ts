// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/parseInput`
 * Purpose: Validates raw facade input against an operation contract and maps shape errors to domain errors.
 * Scope: Contract parsing and caller context normalisation. Does not apply business rules.
 * Invariants:
 * - A shape error on an identity field becomes InvalidAddress; on amount/credentialId becomes InvalidAmount.
 * - Other shape errors surface as the ZodError itself.
 * Side-effects: none
 * @public
 */

import type { z } from "zod";

import {
  type CallerContextInput,
  CallerContextSchema,
} from "@/contracts/ledger.shared.v1.contract";
import {
  type CallerContext,
  InvalidAddressError,
  InvalidAmountError,
  normalizeAddress,
} from "@/core";

const AMOUNT_FIELDS = new Set(["amount", "credentialId"]);

export interface OperationContract<S extends z.ZodTypeAny> {
  readonly id: string;
  readonly input: S;
  readonly addressFields: readonly string[];
}

function rawField(raw: unknown, field: string): string {
  if (typeof raw !== "object" || raw === null) return String(raw);
  const entry = Object.entries(raw).find(([key]) => key === field);
  return entry ? String(entry[1]) : "undefined";
}

export function parseOperationInput<S extends z.ZodTypeAny>(
  operation: OperationContract<S>,
  raw: unknown
): z.output<S> {
  const parsed = operation.input.safeParse(raw);
  if (parsed.success) return parsed.data;

  const field = parsed.error.issues[0]?.path[0];
  if (typeof field === "string") {
    if (operation.addressFields.includes(field)) {
      throw new InvalidAddressError(field, rawField(raw, field));
    }
    if (AMOUNT_FIELDS.has(field)) {
      throw new InvalidAmountError(rawField(raw, field));
    }
  }
  throw parsed.error;
}

/** @throws InvalidAddressError when caller or any approval is not a usable identity */
export function parseCallerContext(raw: CallerContextInput): CallerContext {
  const parsed = CallerContextSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidAddressError("caller", rawField(raw, "caller"));
  }
  const { caller, approvals, reqId } = parsed.data;
  return {
    caller: normalizeAddress(caller, "caller"),
    approvals: (approvals ?? []).map((approval) =>
      normalizeAddress(approval, "approvals")
    ),
    ...(reqId !== undefined ? { reqId } : {}),
  };
}

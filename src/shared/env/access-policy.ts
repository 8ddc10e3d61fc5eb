// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/access-policy`
 * Purpose: Derives the ledger access policy configuration from validated env.
 * Scope: Maps LEDGER_* variables onto AccessPolicyConfig. Does not evaluate authorization.
 * Invariants: Every configured address is checksummed; a malformed one fails with EnvValidationError naming the variable.
 * Side-effects: none
 * Links: src/core/access/rules.ts
 * @public
 */

import {
  type AccessPolicyConfig,
  type Address,
  type PrivilegedAction,
  tryNormalizeAddress,
} from "@/core";

import { EnvValidationError, type ServerEnv } from "./server";

type AccessEnv = Pick<
  ServerEnv,
  | "LEDGER_ACCESS_POLICY"
  | "LEDGER_OWNER_ADDRESS"
  | "LEDGER_MULTISIG_SIGNERS"
  | "LEDGER_MULTISIG_THRESHOLD"
  | "LEDGER_VERIFIER_ADDRESSES"
  | "LEDGER_TOKEN_ADMIN_ADDRESSES"
  | "LEDGER_TREASURY_ADDRESSES"
>;

function invalid(variable: string): EnvValidationError {
  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [],
    invalid: [variable],
  });
}

function missing(variable: string): EnvValidationError {
  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [variable],
    invalid: [],
  });
}

function addresses(variable: string, values: readonly string[]): Address[] {
  return values.map((value) => {
    const address = tryNormalizeAddress(value);
    if (!address) throw invalid(variable);
    return address;
  });
}

export function accessPolicyConfigFromEnv(env: AccessEnv): AccessPolicyConfig {
  switch (env.LEDGER_ACCESS_POLICY) {
    case "single_owner": {
      if (!env.LEDGER_OWNER_ADDRESS) throw missing("LEDGER_OWNER_ADDRESS");
      const [owner] = addresses("LEDGER_OWNER_ADDRESS", [
        env.LEDGER_OWNER_ADDRESS,
      ]);
      if (!owner) throw invalid("LEDGER_OWNER_ADDRESS");
      return { kind: "single_owner", owner };
    }
    case "multisig": {
      const signers = addresses(
        "LEDGER_MULTISIG_SIGNERS",
        env.LEDGER_MULTISIG_SIGNERS
      );
      if (signers.length === 0) throw missing("LEDGER_MULTISIG_SIGNERS");
      const threshold = env.LEDGER_MULTISIG_THRESHOLD;
      if (threshold === undefined) throw missing("LEDGER_MULTISIG_THRESHOLD");
      if (threshold > signers.length) throw invalid("LEDGER_MULTISIG_THRESHOLD");
      return { kind: "multisig", signers, threshold };
    }
    case "role_based": {
      const roles: Partial<Record<PrivilegedAction, Address[]>> = {
        "charity.verify": addresses(
          "LEDGER_VERIFIER_ADDRESSES",
          env.LEDGER_VERIFIER_ADDRESSES
        ),
        "token.set_support": addresses(
          "LEDGER_TOKEN_ADMIN_ADDRESSES",
          env.LEDGER_TOKEN_ADMIN_ADDRESSES
        ),
        "funds.emergency_withdraw": addresses(
          "LEDGER_TREASURY_ADDRESSES",
          env.LEDGER_TREASURY_ADDRESSES
        ),
      };
      return { kind: "role_based", roles };
    }
  }
}

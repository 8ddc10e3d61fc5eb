// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/access/model`
 * Purpose: Caller identity and privileged-action vocabulary.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants: Access policy shape is fixed at construction; there is no runtime owner change.
 * Side-effects: none
 * @public
 */

import type { Address } from "../tokens/model";

export const PRIVILEGED_ACTIONS = [
  "charity.verify",
  "token.set_support",
  "funds.emergency_withdraw",
] as const;
export type PrivilegedAction = (typeof PRIVILEGED_ACTIONS)[number];

/** Authenticated identity of the party invoking an operation */
export interface CallerContext {
  readonly caller: Address;
  /** Co-signers attesting to this call; only read by the multisig policy */
  readonly approvals?: readonly Address[];
  /** Correlation id for logs; generated when absent */
  readonly reqId?: string;
}

export type AccessPolicyConfig =
  | { readonly kind: "single_owner"; readonly owner: Address }
  | {
      readonly kind: "multisig";
      readonly signers: readonly Address[];
      readonly threshold: number;
    }
  | {
      readonly kind: "role_based";
      readonly roles: Readonly<
        Partial<Record<PrivilegedAction, readonly Address[]>>
      >;
    };

export type AccessPolicyKind = AccessPolicyConfig["kind"];

export interface AccessPolicy {
  readonly kind: AccessPolicyKind;
  isAuthorized(action: PrivilegedAction, ctx: CallerContext): boolean;
}

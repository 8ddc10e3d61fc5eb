// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/access/rules`
 * Purpose: Access policy implementations (single owner, multisig, role based).
 * Scope: Pure decision functions over a fixed configuration. Does not perform I/O.
 * Invariants:
 * - Address comparison is case-insensitive.
 * - Multisig counts distinct signers among caller + approvals; non-signers never count.
 * - Role-based denies any action with no configured role set.
 * Side-effects: none
 * @public
 */

import type { Address } from "../tokens/model";
import { UnauthorizedError } from "./errors";
import {
  type AccessPolicy,
  type AccessPolicyConfig,
  type CallerContext,
  PRIVILEGED_ACTIONS,
  type PrivilegedAction,
} from "./model";

const key = (address: Address): string => address.toLowerCase();

function toKeySet(addresses: readonly Address[]): ReadonlySet<string> {
  return new Set(addresses.map(key));
}

/**
 * Builds the policy for a configuration.
 * @throws Error when a multisig threshold is outside 1..signers
 */
export function createAccessPolicy(config: AccessPolicyConfig): AccessPolicy {
  switch (config.kind) {
    case "single_owner": {
      const owner = key(config.owner);
      return {
        kind: config.kind,
        isAuthorized: (_action, ctx) => key(ctx.caller) === owner,
      };
    }
    case "multisig": {
      const signers = toKeySet(config.signers);
      const { threshold } = config;
      if (
        !Number.isInteger(threshold) ||
        threshold < 1 ||
        threshold > signers.size
      ) {
        throw new Error(
          `Multisig threshold ${threshold} must be between 1 and ${signers.size}`
        );
      }
      return {
        kind: config.kind,
        isAuthorized: (_action, ctx) => {
          const participants = new Set(
            [ctx.caller, ...(ctx.approvals ?? [])].map(key)
          );
          let count = 0;
          for (const participant of participants) {
            if (signers.has(participant)) count++;
          }
          return count >= threshold;
        },
      };
    }
    case "role_based": {
      const roles = new Map<PrivilegedAction, ReadonlySet<string>>();
      for (const [action, members] of Object.entries(config.roles)) {
        if (isPrivilegedAction(action) && members) {
          roles.set(action, toKeySet(members));
        }
      }
      return {
        kind: config.kind,
        isAuthorized: (action, ctx) =>
          roles.get(action)?.has(key(ctx.caller)) ?? false,
      };
    }
  }
}

function isPrivilegedAction(value: string): value is PrivilegedAction {
  return PRIVILEGED_ACTIONS.some((action) => action === value);
}

/** @throws UnauthorizedError when the policy denies the caller */
export function assertAuthorized(
  policy: AccessPolicy,
  action: PrivilegedAction,
  ctx: CallerContext
): void {
  if (!policy.isAuthorized(action, ctx)) {
    throw new UnauthorizedError(action, ctx.caller);
  }
}

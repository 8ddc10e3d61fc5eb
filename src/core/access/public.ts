// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/access/public`
 * Purpose: Public API for access policies and guard errors.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export {
  isReentrantCallError,
  isUnauthorizedError,
  ReentrantCallError,
  UnauthorizedError,
} from "./errors";
export type {
  AccessPolicy,
  AccessPolicyConfig,
  AccessPolicyKind,
  CallerContext,
  PrivilegedAction,
} from "./model";
export { assertAuthorized, createAccessPolicy } from "./rules";

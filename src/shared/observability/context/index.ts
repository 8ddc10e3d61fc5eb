// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Operation context exports.
 * Scope: Barrel export.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export { createOperationContext, sanitizeReqId } from "./factory";
export type { OperationContext } from "./types";

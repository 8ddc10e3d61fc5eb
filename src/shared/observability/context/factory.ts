// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for creating operation-scoped context with sanitized reqId.
 * Scope: Create OperationContext with child logger; sanitize caller-supplied reqId. Does not manage context lifecycle.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-); otherwise a random UUID is used.
 * Side-effects: none
 * Links: Returns OperationContext; called at every ledger facade entry point.
 * @public
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import type { OperationContext } from "./types";

const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/** Max 64 chars, alphanumeric + _- only */
export function sanitizeReqId(incoming: string | undefined): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return randomUUID();
}

export function createOperationContext(
  deps: { baseLog: Logger },
  meta: { operation: string; reqId?: string | undefined; caller?: string }
): OperationContext {
  const reqId = sanitizeReqId(meta.reqId);

  return {
    log: deps.baseLog.child({
      reqId,
      operation: meta.operation,
      ...(meta.caller ? { caller: meta.caller } : {}),
    }),
    reqId,
    operation: meta.operation,
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Operation-scoped context type for passing logger and correlation id through layers.
 * Scope: Define OperationContext interface. Does not implement context creation or lifecycle.
 * Invariants: log is child logger with reqId and operation bound.
 * Side-effects: none
 * Links: Created by factory module; passed from the ledger facade into feature services.
 * @public
 */

import type { Logger } from "pino";

export interface OperationContext {
  log: Logger; // Child logger with reqId, operation
  reqId: string; // Correlation ID
  operation: string;
}

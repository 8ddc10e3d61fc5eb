// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events, logging, metrics, context.
 * Scope: Unified entry point for all observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * Links: Delegates to events, server, context submodules.
 * @public
 */

export type { OperationContext } from "./context";
export { createOperationContext, sanitizeReqId } from "./context";
export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { Logger } from "./server";
export {
  failureCode,
  ledgerCredentialsMintedTotal,
  ledgerDonationsTotal,
  ledgerOperationDurationMs,
  ledgerOperationFailuresTotal,
  ledgerOperationsTotal,
  logEvent,
  makeLogger,
  makeNoopLogger,
  metricsRegistry,
  REDACT_PATHS,
} from "./server";

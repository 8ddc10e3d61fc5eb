// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define payload schemas.
 * Invariants:
 * - All event names registered here; logEvent() enforces base fields (reqId always).
 * - Ledger domain event names equal LedgerEvent["type"] (checked at compile time below).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by the ledger facade and event publisher.
 * @public
 */

import type { LedgerEventType } from "@/core";

export const EVENT_NAMES = {
  // Ledger domain events (published after commit)
  TOKEN_SUPPORT_CHANGED: "token.support_changed",
  CHARITY_REGISTERED: "charity.registered",
  CHARITY_VERIFIED: "charity.verified",
  DONATION_MADE: "donation.made",
  CREDENTIAL_MINTED: "credential.minted",
  CREDENTIAL_UPDATED: "credential.updated",
  FUNDS_EMERGENCY_WITHDRAWN: "funds.emergency_withdrawn",

  // Operation lifecycle
  LEDGER_OPERATION_COMPLETED: "ledger.operation_completed",
  LEDGER_OPERATION_FAILED: "ledger.operation_failed",

  // Adapter Events
  ADAPTER_VIEM_TRANSFER_SUBMITTED: "adapter.viem.transfer_submitted",
  ADAPTER_VIEM_TRANSFER_ERROR: "adapter.viem.transfer_error",

  // Invariant Warnings
  INV_UNKNOWN_ERROR_IN_LEDGER_OPERATION: "inv_unknown_error_in_ledger_operation",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

// Every domain event type must have a registry entry
type MissingLedgerEventNames = Exclude<LedgerEventType, EventName>;
const _ledgerEventsRegistered: MissingLedgerEventNames extends never
  ? true
  : MissingLedgerEventNames = true;
void _ledgerEventsRegistered;

// ============================================================================
// Base Field Enforcement (for logEvent() helper)
// ============================================================================

/**
 * Required base fields for all events.
 * reqId is ALWAYS required; operation names the facade method.
 */
export interface EventBase {
  reqId: string;
  operation?: string;
}

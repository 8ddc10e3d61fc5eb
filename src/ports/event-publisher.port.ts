// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/event-publisher`
 * Purpose: Sink for committed ledger events.
 * Scope: Interface only.
 * Invariants: Only called after the producing transaction committed, in emission order.
 * Side-effects: none (interface definition only)
 * @public
 */

import type { LedgerEvent } from "@/core";

export interface EventPublisher {
  publish(events: readonly LedgerEvent[], meta: { reqId: string }): void;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/events/public`
 * Purpose: Public API for ledger domain events.
 * Scope: Barrel export.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export type { LedgerEvent, LedgerEventType } from "./model";

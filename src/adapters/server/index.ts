// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Production adapter implementations of ledger ports.
 * Scope: Re-exports server adapters. Does not contain implementation logic.
 * Invariants: Named exports only.
 * Side-effects: none (re-exports only)
 * Links: Wired by src/bootstrap/container.ts
 * @public
 */

export { createDb, type Database, getDb } from "./db/client";
export { PinoEventPublisher } from "./events/pino-event-publisher.adapter";
export { DrizzleLedgerStore } from "./ledger/drizzle-ledger-store.adapter";
export { SystemClock } from "./time/system.adapter";
export {
  type ViemValueTransferConfig,
  ViemValueTransferAdapter,
} from "./transfers/viem-value-transfer.adapter";

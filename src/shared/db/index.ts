// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Barrel export for database schema and URL construction utilities.
 * Scope: Exposes database schema and URL construction utilities. Does not handle connections or migrations.
 * Invariants: Only re-exports public APIs.
 * Side-effects: none
 * Links: Used by the drizzle client and ledger store adapter
 * @public
 */

export * from "./db-url";
export * from "./schema";

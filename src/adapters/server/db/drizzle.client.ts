// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client configuration and connection management.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: Single database connection instance per URL; lazy initialization
 * Side-effects: IO (database connections) - only on first access
 * Notes: Uses postgres driver with Drizzle ORM; connection string from serverEnv().
 * Links: Used by DrizzleLedgerStore
 * @internal
 */

import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db";

// Schema-aware database type
export type Database = PostgresJsDatabase<typeof schema>;

let _db: Database | null = null;

export function createDb(databaseUrl: string): Database {
  const client = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: "charity_ledger",
    },
  });
  return drizzle(client, { schema });
}

/** Lazy process-wide instance; created on first call */
export function getDb(databaseUrl: string): Database {
  if (!_db) {
    _db = createDb(databaseUrl);
  }
  return _db;
}

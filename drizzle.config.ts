// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: drizzle-kit configuration for generating ledger migrations.
 * Scope: Schema path and migration output. Does not open runtime connections.
 * Invariants: Schema path matches src/shared/db/schema.ts.
 * Side-effects: IO (drizzle-kit writes migrations)
 * Notes: Uses DATABASE_URL when set, otherwise builds it from the POSTGRES_* pieces.
 * @public
 */

import { defineConfig } from "drizzle-kit";

import { buildDatabaseUrl } from "./src/shared/db/db-url";

function getDatabaseUrl(): string {
  if (process.env.DATABASE_URL) {
    return process.env.DATABASE_URL;
  }
  return buildDatabaseUrl(process.env);
}

export default defineConfig({
  schema: "./src/shared/db/schema.ts",
  out: "./src/adapters/server/db/migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  verbose: true,
  strict: true,
});

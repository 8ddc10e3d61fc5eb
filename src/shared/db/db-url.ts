// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/db-url`
 * Purpose: Builds a PostgreSQL connection URL from component env vars.
 * Scope: Shared by serverEnv() and drizzle.config.ts. Does not handle connections or defaults beyond the port.
 * Invariants: Pure function; user and password are percent-encoded; throws TypeError when a piece is missing.
 * Side-effects: none
 * @public
 */

export interface DbEnvInput {
  POSTGRES_USER?: string | undefined;
  POSTGRES_PASSWORD?: string | undefined;
  POSTGRES_DB?: string | undefined;
  DB_HOST?: string | undefined;
  DB_PORT?: string | number | undefined;
}

export function buildDatabaseUrl(env: DbEnvInput): string {
  const { POSTGRES_USER: user, POSTGRES_PASSWORD: password } = env;
  const { POSTGRES_DB: db, DB_HOST: host } = env;
  const port =
    typeof env.DB_PORT === "number"
      ? env.DB_PORT
      : Number(env.DB_PORT ?? "5432");

  if (!user || !password || !db || !host) {
    throw new TypeError(
      "Missing required DB env vars: POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB, DB_HOST"
    );
  }
  if (!Number.isInteger(port) || port <= 0) {
    throw new TypeError(`Invalid DB_PORT value: ${String(env.DB_PORT)}`);
  }

  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${db}`;
}

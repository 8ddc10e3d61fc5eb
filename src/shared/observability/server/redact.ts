// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys; addresses and amounts stay visible.
 * Side-effects: none
 * Links: Used by pino redact configuration in makeLogger.
 * @public
 */

export const REDACT_PATHS = [
  // Secrets
  "password",
  "secret",
  "apiKey",
  "DATABASE_URL",
  "databaseUrl",
  "POSTGRES_PASSWORD",
  // Operator wallet
  "privateKey",
  "OPERATOR_PRIVATE_KEY",
  "operatorPrivateKey",
  "mnemonic",
  "seed",
  // Nested under an env/config binding
  "*.OPERATOR_PRIVATE_KEY",
  "*.DATABASE_URL",
];

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and ledger metric definitions.
 * Scope: Shared observability singleton. Does not implement HTTP transport or scrape endpoints.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (operation, error code).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors across test reloads.
 * Links: Recorded by the ledger facade.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "charity-ledger",
    env: process.env.APP_ENV ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

// =============================================================================
// Metric Factory Helpers (prevent duplicate registration)
// =============================================================================

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: labelNames as T[],
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames: labelNames as T[],
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// Ledger Metrics
// =============================================================================

export const ledgerOperationsTotal = getOrCreateCounter(
  "ledger_operations_total",
  "Ledger operations by name and outcome",
  ["operation", "outcome"] as const
);

export const ledgerOperationDurationMs = getOrCreateHistogram(
  "ledger_operation_duration_ms",
  "Ledger operation latency in milliseconds, including external transfers",
  ["operation"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 15000]
);

export const ledgerOperationFailuresTotal = getOrCreateCounter(
  "ledger_operation_failures_total",
  "Failed ledger operations by error code",
  ["operation", "code"] as const
);

export const ledgerDonationsTotal = getOrCreateCounter(
  "ledger_donations_total",
  "Committed donations"
);

export const ledgerCredentialsMintedTotal = getOrCreateCounter(
  "ledger_credentials_minted_total",
  "Reputation credentials minted"
);

/** Error code label for failure metrics; unknown errors collapse to "internal" */
export function failureCode(error: unknown): string {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return "internal";
}

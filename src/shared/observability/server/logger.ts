// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logger`
 * Purpose: Root pino logger for the ledger process.
 * Scope: Builds the root logger that the container hands to adapters and the facade. Operation-scoped children come from createOperationContext.
 * Invariants:
 * - Every line carries app, service and chainId (when known); caller bindings cannot override them.
 * - Secrets listed in REDACT_PATHS are censored; `err` goes through pino's error serializer.
 * - Disabled under Vitest / NODE_ENV=test unless `enabled` is passed.
 * Side-effects: none until the logger writes (stdout by default)
 * Notes: Reads NODE_ENV, PINO_LOG_LEVEL and VITEST directly so importing it never triggers serverEnv() validation.
 * Links: src/bootstrap/container.ts, ./redact.ts
 * @public
 */

import type { DestinationStream, Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export const LEDGER_APP_NAME = "charity-ledger";

export interface LedgerLoggerOptions {
  readonly service?: string;
  /** Chain the value-transfer adapter settles on */
  readonly chainId?: number;
  readonly level?: string;
  readonly enabled?: boolean;
  /** Defaults to fd 1 (sync outside production) */
  readonly destination?: DestinationStream;
  readonly bindings?: Record<string, unknown>;
}

export function makeLogger(options: LedgerLoggerOptions = {}): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const silenced = process.env.VITEST === "true" || nodeEnv === "test";

  const base: Record<string, unknown> = {
    ...options.bindings,
    app: LEDGER_APP_NAME,
    service: options.service ?? process.env.SERVICE_NAME ?? LEDGER_APP_NAME,
  };
  if (options.chainId !== undefined) base.chainId = options.chainId;

  const destination =
    options.destination ??
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    });

  return pino(
    {
      level: options.level ?? process.env.PINO_LOG_LEVEL ?? "info",
      enabled: options.enabled ?? !silenced,
      base,
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    destination
  );
}

/** pino with enabled:false; same type as makeLogger, no output */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

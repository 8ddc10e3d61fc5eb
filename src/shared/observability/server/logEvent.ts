// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Type-safe event logger that enforces event name registry and base fields.
 * Scope: Single function for logging structured events. Does not create loggers.
 * Invariants:
 * - reqId MUST be present (throws under Vitest, logs error elsewhere).
 * - event name MUST be from registry.
 * - bigint fields are logged as decimal strings so amounts never lose precision.
 * Side-effects: IO (logging)
 * Links: Uses EVENT_NAMES registry from events/index.ts; called by features/adapters.
 * @public
 */

import type { Logger } from "pino";
import type { EventBase, EventName } from "../events";

function toLogFields(
  fields: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

/**
 * Type-safe event logger - enforces event name from registry and base fields.
 *
 * @param eventName - Event name from EVENT_NAMES registry
 * @param fields - Event-specific fields (MUST include reqId)
 * @param message - Human-readable message (defaults to event name)
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string
): void {
  if (!fields.reqId) {
    const isStrict =
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without reqId`
      );
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger.info(
    { event: eventName, ...toLogFields(fields) },
    message ?? eventName
  );
}

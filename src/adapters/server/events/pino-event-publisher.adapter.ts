// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/pino-event-publisher`
 * Purpose: EventPublisher that writes committed ledger events as structured log lines.
 * Scope: Maps each LedgerEvent onto logEvent() with its registry name. Does not buffer or retry.
 * Invariants: One log line per event, in emission order; event type doubles as the log event name.
 * Side-effects: IO (logging)
 * Links: src/ports/event-publisher.port.ts, src/shared/observability/events
 * @public
 */

import type { LedgerEvent } from "@/core";
import type { EventPublisher } from "@/ports";
import { type Logger, logEvent } from "@/shared/observability";

export class PinoEventPublisher implements EventPublisher {
  constructor(private readonly log: Logger) {}

  publish(events: readonly LedgerEvent[], meta: { reqId: string }): void {
    for (const event of events) {
      const { type, ...fields } = event;
      logEvent(this.log, type, { reqId: meta.reqId, ...fields });
    }
  }
}

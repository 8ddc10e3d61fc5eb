// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/system`
 * Purpose: Wall-clock implementation of the Clock port.
 * Scope: Returns the current system time. Does not handle timezones.
 * Invariants: Returns a new Date on every call
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port
 * @internal
 */

import type { Clock } from "@/ports";

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

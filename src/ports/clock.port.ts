// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for record timestamps.
 * Scope: Returns the current instant. Does not handle timezone conversion or date arithmetic.
 * Invariants: Each call returns a fresh Date; callers may keep it without copying.
 * Side-effects: none (interface only)
 * Links: Implemented by SystemClock and tests/_fakes FakeClock
 * @public
 */

export interface Clock {
  now(): Date;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-clock`
 * Purpose: Deterministic Clock for ledger tests.
 * Scope: Controlled time source implementing the Clock port. Does NOT replace the global Date.
 * Invariants: Time advances only via explicit calls; now() returns a fresh Date each call.
 * Side-effects: none
 * Links: src/ports/clock.port.ts
 * @public
 */

import type { Clock } from "@/ports";

export const FAKE_CLOCK_START = "2024-01-01T00:00:00.000Z";

export class FakeClock implements Clock {
  private currentTime: Date;

  constructor(initialTime: string | Date = FAKE_CLOCK_START) {
    this.currentTime = new Date(initialTime);
  }

  now(): Date {
    return new Date(this.currentTime.getTime());
  }

  advance(milliseconds: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + milliseconds);
  }

  setTime(time: string | Date): void {
    this.currentTime = new Date(time);
  }

  reset(): void {
    this.currentTime = new Date(FAKE_CLOCK_START);
  }
}

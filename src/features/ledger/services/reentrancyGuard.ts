// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/reentrancyGuard`
 * Purpose: Single-entry guard around operations that call the external transfer primitive.
 * Scope: Nested-call detection via AsyncLocalStorage plus a FIFO promise-chain mutex. Does not know which operations it guards.
 * Invariants:
 * - A guarded call started from inside another guarded call's async context rejects immediately with ReentrantCallError.
 * - Independent guarded calls run one at a time, in arrival order.
 * - The lock is released when the guarded callback settles, whatever the outcome.
 * Side-effects: none
 * Links: src/features/ledger/ledger.facade.ts
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";

import { ReentrantCallError } from "@/core";

interface ActiveCall {
  readonly operation: string;
}

export class ReentrancyGuard {
  private readonly active = new AsyncLocalStorage<ActiveCall>();
  private tail: Promise<void> = Promise.resolve();

  /** Name of the guarded operation this async context is running inside, if any */
  currentOperation(): string | null {
    return this.active.getStore()?.operation ?? null;
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const outer = this.active.getStore();
    if (outer) {
      throw new ReentrantCallError(operation, outer.operation);
    }

    const previous = this.tail;
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => held);

    await previous;
    try {
      return await this.active.run({ operation }, fn);
    } finally {
      release();
    }
  }
}

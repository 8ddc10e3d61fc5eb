// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/unitOfWork`
 * Purpose: Runs one ledger mutation inside a store transaction with buffered domain events.
 * Scope: Transaction + event buffer plumbing. Does not publish events or check authorization.
 * Invariants:
 * - Events emitted inside the callback are returned only if the transaction commits.
 * - `now` is read once per transaction, so every record written by one operation shares a timestamp.
 * Side-effects: IO (via LedgerStore)
 * @public
 */

import type { LedgerEvent } from "@/core";
import type { Clock, LedgerStore, LedgerWriter } from "@/ports";

export interface LedgerTx {
  readonly tx: LedgerWriter;
  readonly now: Date;
  emit(event: LedgerEvent): void;
}

export interface Committed<T> {
  readonly result: T;
  readonly events: readonly LedgerEvent[];
}

export async function runLedgerTransaction<T>(
  deps: { store: LedgerStore; clock: Clock },
  fn: (scope: LedgerTx) => Promise<T>
): Promise<Committed<T>> {
  const events: LedgerEvent[] = [];
  const result = await deps.store.transaction((tx) =>
    fn({
      tx,
      now: deps.clock.now(),
      emit: (event) => {
        events.push(event);
      },
    })
  );
  return { result, events };
}

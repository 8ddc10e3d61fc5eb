// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/test/in-memory-ledger-store`
 * Purpose: Transaction semantics of the in-process LedgerStore.
 * Scope: Commit, rollback, isolation, id allocation and uniqueness. Does not test the Drizzle store.
 * Invariants: Rolled-back writes are invisible; id counters never rewind.
 * Side-effects: none
 * Links: src/adapters/test/ledger/in-memory-ledger-store.adapter.ts
 * @public
 */

import { CHARITY_A, CHARITY_B, DONOR_A, DONOR_B, TOKEN_A } from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import { InMemoryLedgerStore } from "@/adapters/test";
import {
  CharityAlreadyRegisteredError,
  createCharity,
  type DonationRecord,
} from "@/core";

const NOW = new Date("2024-01-01T00:00:00.000Z");

function donation(id: bigint, donor = DONOR_A): DonationRecord {
  return {
    id,
    donor,
    charityId: CHARITY_A,
    amount: 10n,
    tokenId: TOKEN_A,
    message: "",
    createdAt: NOW,
  };
}

describe("InMemoryLedgerStore", () => {
  let store: InMemoryLedgerStore;

  beforeEach(() => {
    store = new InMemoryLedgerStore();
  });

  it("commits writes when the callback resolves", async () => {
    await store.transaction(async (tx) => {
      await tx.setTokenSupport({
        tokenId: TOKEN_A,
        supported: true,
        updatedAt: NOW,
      });
    });

    expect(await store.getTokenSupport(TOKEN_A)).toEqual({
      tokenId: TOKEN_A,
      supported: true,
      updatedAt: NOW,
    });
    expect(store.commits).toBe(1);
  });

  it("discards writes when the callback throws", async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.insertCharity(
          createCharity(
            CHARITY_A,
            { name: "n", description: "", metadataPointer: "p" },
            NOW
          )
        );
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect(await store.findCharity(CHARITY_A)).toBeNull();
    expect(store.rollbacks).toBe(1);
  });

  it("hides uncommitted writes from readers outside the transaction", async () => {
    let outside: DonationRecord | null = donation(99n);
    await store.transaction(async (tx) => {
      await tx.insertDonation(donation(0n));
      expect(await tx.findDonation(0n)).not.toBeNull();
      outside = await store.findDonation(0n);
    });

    expect(outside).toBeNull();
    expect(await store.findDonation(0n)).not.toBeNull();
  });

  it("never reuses an id allocated by a rolled-back transaction", async () => {
    await store
      .transaction(async (tx) => {
        await tx.nextDonationId();
        await tx.nextCredentialId();
        throw new Error("abort");
      })
      .catch(() => undefined);

    const ids = await store.transaction(async (tx) => ({
      donation: await tx.nextDonationId(),
      credential: await tx.nextCredentialId(),
    }));

    expect(ids).toEqual({ donation: 1n, credential: 2n });
  });

  it("rejects a duplicate donation id", async () => {
    await store.transaction((tx) => tx.insertDonation(donation(0n)));
    await expect(
      store.transaction((tx) => tx.insertDonation(donation(0n)))
    ).rejects.toThrow(/duplicate key/);
  });

  it("reports a charity insert that conflicts inside one transaction", async () => {
    const charity = createCharity(
      CHARITY_A,
      { name: "First", description: "", metadataPointer: "p" },
      NOW
    );

    const results = await store.transaction(async (tx) => [
      await tx.insertCharity(charity),
      await tx.insertCharity({ ...charity, name: "Second" }),
    ]);

    expect(results).toEqual([true, false]);
    expect((await store.findCharity(CHARITY_A))?.name).toBe("First");
  });

  it("fails the later commit when two transactions insert the same charity", async () => {
    const charity = (name: string) =>
      createCharity(
        CHARITY_A,
        { name, description: "", metadataPointer: "p" },
        NOW
      );
    let releaseFirst: () => void = () => undefined;
    const firstHeld = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.transaction(async (tx) => {
      const inserted = await tx.insertCharity(charity("First"));
      await firstHeld;
      return inserted;
    });
    const second = store.transaction((tx) =>
      tx.insertCharity(charity("Second"))
    );

    await expect(second).resolves.toBe(true);
    releaseFirst();
    await expect(first).rejects.toBeInstanceOf(CharityAlreadyRegisteredError);
    expect((await store.findCharity(CHARITY_A))?.name).toBe("Second");
    expect(store.commits).toBe(1);
    expect(store.rollbacks).toBe(1);
  });

  it("marks a charity verified once", async () => {
    await store.transaction((tx) =>
      tx.insertCharity(
        createCharity(
          CHARITY_A,
          { name: "n", description: "", metadataPointer: "p" },
          NOW
        )
      )
    );
    const later = new Date("2024-01-02T00:00:00.000Z");

    expect(
      await store.transaction((tx) => tx.markCharityVerified(CHARITY_A, later))
    ).toBe(true);
    expect(
      await store.transaction((tx) => tx.markCharityVerified(CHARITY_A, later))
    ).toBe(false);
    expect(
      await store.transaction((tx) => tx.markCharityVerified(CHARITY_B, later))
    ).toBe(false);
    expect(await store.findCharity(CHARITY_A)).toMatchObject({
      verified: true,
      updatedAt: later,
    });
  });

  it("lists donation ids in ascending order", async () => {
    await store.transaction(async (tx) => {
      await tx.insertDonation(donation(2n, DONOR_B));
      await tx.insertDonation(donation(0n));
      await tx.insertDonation(donation(1n, DONOR_B));
    });

    expect(await store.listDonationIdsByCharity(CHARITY_A)).toEqual([
      0n,
      1n,
      2n,
    ]);
    expect(await store.listDonationIdsByDonor(DONOR_B)).toEqual([1n, 2n]);
  });

  it("reset() drops state and rewinds counters", async () => {
    await store.transaction(async (tx) => {
      await tx.insertDonation(donation(await tx.nextDonationId()));
    });
    store.reset();

    expect(await store.findDonation(0n)).toBeNull();
    expect(store.allocateDonationId()).toBe(0n);
    expect(store.commits).toBe(0);
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/ledger/donate`
 * Purpose: End-to-end donate flow through the ledger facade over in-process adapters.
 * Scope: Validation order, accounting, credential mint/update, tier progression, transfer failure rollback. Does not test the guard (see reentrancy spec).
 * Invariants:
 * - All checks run before the transfer; nothing is written or published when it fails.
 * - First donation mints then counts; later donations only update.
 * Side-effects: none
 * Links: src/features/ledger/services/donationLedger.ts, src/features/ledger/ledger.facade.ts
 * @public
 */

import {
  CHARITY_A,
  CHARITY_B,
  createTestLedger,
  DONOR_A,
  DONOR_B,
  FAKE_CLOCK_START,
  OWNER,
  seedVerifiedCharity,
  type TestLedger,
  TOKEN_A,
  TOKEN_B,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import { TransferFailedError } from "@/core";

const SETUP_EVENTS = [
  "charity.registered",
  "charity.verified",
  "token.support_changed",
] as const;

describe("features/ledger donate", () => {
  let t: TestLedger;

  beforeEach(async () => {
    t = createTestLedger();
    await seedVerifiedCharity(t.ledger);
  });

  function donate(amount: bigint | string | number, donor = DONOR_A) {
    return t.ledger.donate(
      { caller: donor },
      { charityId: CHARITY_A, tokenId: TOKEN_A, amount, message: "for wells" }
    );
  }

  describe("happy path", () => {
    it("records the first donation, updates the charity and mints a Bronze credential", async () => {
      const id = await donate(100n);

      expect(id).toBe(0n);
      expect(await t.ledger.getDonation({}, { donationId: 0n })).toEqual({
        id: 0n,
        donor: DONOR_A,
        charityId: CHARITY_A,
        amount: 100n,
        tokenId: TOKEN_A,
        message: "for wells",
        createdAt: new Date(FAKE_CLOCK_START),
      });

      const charity = await t.ledger.getCharity({}, { charityId: CHARITY_A });
      expect(charity?.totalDonations).toBe(100n);
      expect(charity?.donorCount).toBe(1);
      expect(
        await t.ledger.getCharityContribution(
          {},
          { charityId: CHARITY_A, donor: DONOR_A }
        )
      ).toBe(100n);

      const credential = await t.ledger.getCredentialMetadata(
        {},
        { donor: DONOR_A }
      );
      expect(credential).toMatchObject({
        id: 1n,
        donor: DONOR_A,
        totalDonations: 100n,
        donationCount: 1,
        tier: "Bronze",
        lastDonationAt: new Date(FAKE_CLOCK_START),
        metadataPointer: "",
      });
    });

    it("pulls the donation from the donor to the charity", async () => {
      await donate(100n);

      expect(t.transfers.calls).toEqual([
        {
          kind: "transferFrom",
          token: TOKEN_A,
          from: DONOR_A,
          to: CHARITY_A,
          amount: 100n,
        },
      ]);
    });

    it("publishes mint, update and donation events after commit", async () => {
      await t.ledger.donate(
        { caller: DONOR_A, reqId: "req-donate-1" },
        { charityId: CHARITY_A, tokenId: TOKEN_A, amount: 100n }
      );

      expect(t.events.types()).toEqual([
        ...SETUP_EVENTS,
        "credential.minted",
        "credential.updated",
        "donation.made",
      ]);
      expect(t.events.published.at(-1)).toEqual({
        reqId: "req-donate-1",
        event: {
          type: "donation.made",
          donationId: 0n,
          donor: DONOR_A,
          charityId: CHARITY_A,
          tokenId: TOKEN_A,
          amount: 100n,
          message: "",
          createdAt: new Date(FAKE_CLOCK_START),
        },
      });
    });

    it("accepts decimal-string and safe-integer amounts", async () => {
      await donate("250");
      await donate(250);

      const credential = await t.ledger.getCredentialMetadata(
        {},
        { donor: DONOR_A }
      );
      expect(credential.totalDonations).toBe(500n);
    });

    it("updates, without re-minting, on later donations", async () => {
      await donate(100n);
      t.clock.advance(60_000);
      await donate(50n);

      expect(t.events.ofType("credential.minted")).toHaveLength(1);
      expect(await t.ledger.getCredentialId({}, { donor: DONOR_A })).toBe(1n);

      const credential = await t.ledger.getCredentialMetadata(
        {},
        { donor: DONOR_A }
      );
      expect(credential.donationCount).toBe(2);
      expect(credential.totalDonations).toBe(150n);
      expect(credential.lastDonationAt).toEqual(
        new Date(new Date(FAKE_CLOCK_START).getTime() + 60_000)
      );

      const charity = await t.ledger.getCharity({}, { charityId: CHARITY_A });
      expect(charity?.donorCount).toBe(1);
    });

    it("issues one credential per donor with sequential ids", async () => {
      await donate(10n, DONOR_A);
      await donate(10n, DONOR_B);

      expect(await t.ledger.getCredentialId({}, { donor: DONOR_A })).toBe(1n);
      expect(await t.ledger.getCredentialId({}, { donor: DONOR_B })).toBe(2n);
      const charity = await t.ledger.getCharity({}, { charityId: CHARITY_A });
      expect(charity?.donorCount).toBe(2);
    });

    it("indexes donation ids by charity and by donor", async () => {
      await donate(10n, DONOR_A);
      await donate(20n, DONOR_B);
      await donate(30n, DONOR_A);

      expect(
        await t.ledger.getCharityDonationIds({}, { charityId: CHARITY_A })
      ).toEqual([0n, 1n, 2n]);
      expect(
        await t.ledger.getDonorDonationIds({}, { donor: DONOR_A })
      ).toEqual([0n, 2n]);
      expect(
        await t.ledger.getDonorDonationIds({}, { donor: DONOR_B })
      ).toEqual([1n]);
    });
  });

  describe("tier progression", () => {
    it("climbs Silver, Gold, Platinum and Diamond at the thresholds", async () => {
      const tierAfter = async (amount: bigint) => {
        await donate(amount);
        return (await t.ledger.getCredentialMetadata({}, { donor: DONOR_A }))
          .tier;
      };

      expect(await tierAfter(499n)).toBe("Bronze");
      expect(await tierAfter(1n)).toBe("Silver");
      expect(await tierAfter(500n)).toBe("Gold");
      expect(await tierAfter(4_000n)).toBe("Platinum");
      expect(await tierAfter(5_000n)).toBe("Diamond");

      const credential = await t.ledger.getCredentialMetadata(
        {},
        { donor: DONOR_A }
      );
      expect(credential.totalDonations).toBe(10_000n);
      expect(credential.donationCount).toBe(5);
    });
  });

  describe("rejections", () => {
    it("rejects a token that was never whitelisted", async () => {
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          { charityId: CHARITY_A, tokenId: TOKEN_B, amount: 100n }
        )
      ).rejects.toMatchObject({ code: "TOKEN_NOT_SUPPORTED" });
    });

    it("rejects a token whose support was withdrawn", async () => {
      await t.ledger.setTokenSupport(
        { caller: OWNER },
        { tokenId: TOKEN_A, supported: false }
      );
      await expect(donate(100n)).rejects.toMatchObject({
        code: "TOKEN_NOT_SUPPORTED",
      });
    });

    it.each([0n, -1n, -1, "0"])("rejects amount %s", async (amount) => {
      await expect(donate(amount)).rejects.toMatchObject({
        code: "INVALID_AMOUNT",
      });
    });

    it("rejects a non-integer amount as InvalidAmount", async () => {
      await expect(donate("1.5")).rejects.toMatchObject({
        code: "INVALID_AMOUNT",
      });
    });

    it("rejects a message over 1024 characters", async () => {
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          {
            charityId: CHARITY_A,
            tokenId: TOKEN_A,
            amount: 1n,
            message: "m".repeat(1025),
          }
        )
      ).rejects.toMatchObject({ code: "INVALID_METADATA", field: "message" });
    });

    it("rejects an unregistered charity", async () => {
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          { charityId: CHARITY_B, tokenId: TOKEN_A, amount: 1n }
        )
      ).rejects.toMatchObject({ code: "CHARITY_NOT_REGISTERED" });
    });

    it("rejects a registered but unverified charity", async () => {
      await t.ledger.registerCharity(
        { caller: CHARITY_B },
        { name: "Food Bank", metadataPointer: "ipfs://food-bank" }
      );
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          { charityId: CHARITY_B, tokenId: TOKEN_A, amount: 1n }
        )
      ).rejects.toMatchObject({ code: "CHARITY_NOT_VERIFIED" });
    });

    it.each([
      ["malformed", "not-an-address"],
      ["zero", "0x0000000000000000000000000000000000000000"],
    ])("rejects a %s charity id as InvalidAddress", async (_label, charityId) => {
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          { charityId, tokenId: TOKEN_A, amount: 1n }
        )
      ).rejects.toMatchObject({ code: "INVALID_ADDRESS", field: "charityId" });
    });

    it("rejects a malformed caller as InvalidAddress", async () => {
      await expect(
        t.ledger.donate(
          { caller: "donor" },
          { charityId: CHARITY_A, tokenId: TOKEN_A, amount: 1n }
        )
      ).rejects.toMatchObject({ code: "INVALID_ADDRESS", field: "caller" });
    });

    it("checks token support before the amount", async () => {
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          { charityId: CHARITY_A, tokenId: TOKEN_B, amount: 0n }
        )
      ).rejects.toMatchObject({ code: "TOKEN_NOT_SUPPORTED" });
    });

    it.each([
      ["malformed", "not-an-address"],
      ["zero", "0x0000000000000000000000000000000000000000"],
    ])(
      "reports an unsupported token before a %s charity id",
      async (_label, charityId) => {
        await expect(
          t.ledger.donate(
            { caller: DONOR_A },
            { charityId, tokenId: TOKEN_B, amount: 1n }
          )
        ).rejects.toMatchObject({ code: "TOKEN_NOT_SUPPORTED" });
      }
    );

    it("reports an invalid amount before a malformed charity id", async () => {
      await expect(
        t.ledger.donate(
          { caller: DONOR_A },
          { charityId: "not-an-address", tokenId: TOKEN_A, amount: 0n }
        )
      ).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
    });

    it("never reaches the transfer when a check fails", async () => {
      await donate(0n).catch(() => undefined);
      expect(t.transfers.calls).toEqual([]);
      expect(t.events.types()).toEqual([...SETUP_EVENTS]);
    });
  });

  describe("transfer failure", () => {
    it("surfaces a reported failure as TransferFailed and writes nothing", async () => {
      t.transfers.fail("insufficient allowance");

      await expect(donate(100n)).rejects.toMatchObject({
        code: "TRANSFER_FAILED",
        reason: "insufficient allowance",
      });

      expect(await t.ledger.getDonation({}, { donationId: 0n })).toBeNull();
      expect(await t.ledger.getCredentialId({}, { donor: DONOR_A })).toBeNull();
      const charity = await t.ledger.getCharity({}, { charityId: CHARITY_A });
      expect(charity?.totalDonations).toBe(0n);
      expect(t.events.types()).toEqual([...SETUP_EVENTS]);
      expect(t.store.rollbacks).toBe(1);
    });

    it("wraps a throwing transfer with the original error as cause", async () => {
      const rpcError = new Error("rpc unavailable");
      t.transfers.throwOnTransfer(rpcError);

      const error = await donate(100n).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferFailedError);
      expect(error).toMatchObject({
        code: "TRANSFER_FAILED",
        reason: "rpc unavailable",
        cause: rpcError,
      });
      expect(await t.ledger.getDonorDonationIds({}, { donor: DONOR_A })).toEqual(
        []
      );
    });

    it("continues from the same id after a failed attempt", async () => {
      t.transfers.fail();
      await donate(100n).catch(() => undefined);
      t.transfers.succeed();

      expect(await donate(100n)).toBe(0n);
      expect(await donate(100n)).toBe(1n);
    });
  });
});

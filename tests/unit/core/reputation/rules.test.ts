// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/reputation/rules`
 * Purpose: Unit tests for tier thresholds, credential transitions and the ownership rule.
 * Scope: Pure business logic testing. Does not test storage or I/O.
 * Invariants: ALL_MATH_BIGINT; thresholds are inclusive lower bounds.
 * Side-effects: none
 * Links: src/core/reputation/rules.ts
 * @public
 */

import { DONOR_A, DONOR_B } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  applyDonation,
  assertOwnershipChange,
  computeTier,
  createCredential,
  isTokenNotTransferableError,
  TokenNotTransferableError,
} from "@/core";

const MINTED_AT = new Date("2024-01-01T00:00:00.000Z");
const LATER = new Date("2024-02-01T00:00:00.000Z");

describe("core/reputation/rules", () => {
  describe("computeTier", () => {
    it.each([
      [0n, "Bronze"],
      [499n, "Bronze"],
      [500n, "Silver"],
      [999n, "Silver"],
      [1_000n, "Gold"],
      [4_999n, "Gold"],
      [5_000n, "Platinum"],
      [9_999n, "Platinum"],
      [10_000n, "Diamond"],
      [10n ** 30n, "Diamond"],
    ] as const)("maps total %s to %s", (total, tier) => {
      expect(computeTier(total)).toBe(tier);
    });
  });

  describe("assertOwnershipChange", () => {
    it("allows mint (no previous owner)", () => {
      expect(() => assertOwnershipChange(null, DONOR_A, 1n)).not.toThrow();
    });

    it("allows burn (no new owner)", () => {
      expect(() => assertOwnershipChange(DONOR_A, null, 1n)).not.toThrow();
    });

    it("rejects any owner-to-owner move", () => {
      let caught: unknown;
      try {
        assertOwnershipChange(DONOR_A, DONOR_B, 7n);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(TokenNotTransferableError);
      expect(isTokenNotTransferableError(caught)).toBe(true);
      expect(caught).toMatchObject({
        code: "TOKEN_NOT_TRANSFERABLE",
        credentialId: 7n,
        from: DONOR_A,
        to: DONOR_B,
      });
    });

    it("rejects a move back to the same owner", () => {
      expect(() => assertOwnershipChange(DONOR_A, DONOR_A, 1n)).toThrow(
        TokenNotTransferableError
      );
    });
  });

  describe("createCredential", () => {
    it("starts at Bronze with no donations", () => {
      expect(createCredential(1n, DONOR_A, "", MINTED_AT)).toEqual({
        id: 1n,
        donor: DONOR_A,
        totalDonations: 0n,
        donationCount: 0,
        tier: "Bronze",
        lastDonationAt: null,
        metadataPointer: "",
        mintedAt: MINTED_AT,
      });
    });
  });

  describe("applyDonation", () => {
    it("accumulates, counts and recomputes the tier", () => {
      const credential = {
        ...createCredential(3n, DONOR_A, "", MINTED_AT),
        totalDonations: 400n,
        donationCount: 2,
      };

      const updated = applyDonation(credential, 100n, LATER);

      expect(updated.totalDonations).toBe(500n);
      expect(updated.donationCount).toBe(3);
      expect(updated.tier).toBe("Silver");
      expect(updated.lastDonationAt).toEqual(LATER);
      expect(updated.mintedAt).toEqual(MINTED_AT);
    });

    it("does not mutate the input", () => {
      const credential = createCredential(1n, DONOR_A, "", MINTED_AT);
      applyDonation(credential, 10_000n, LATER);
      expect(credential.totalDonations).toBe(0n);
      expect(credential.tier).toBe("Bronze");
    });
  });
});

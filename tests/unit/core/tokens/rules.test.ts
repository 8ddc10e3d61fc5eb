// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/tokens/rules`
 * Purpose: Address normalisation rules shared by every ledger identity.
 * Scope: Pure validation. Does not perform I/O.
 * Invariants: Returned addresses are checksummed and never the zero address.
 * Side-effects: none
 * Links: src/core/tokens/rules.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  InvalidAddressError,
  NATIVE_ASSET,
  normalizeAddress,
  normalizeWithdrawalAsset,
  tryNormalizeAddress,
} from "@/core";

// Checksum vector from EIP-55
const CHECKSUMMED = "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed";

describe("core/tokens/rules", () => {
  describe("tryNormalizeAddress", () => {
    it("checksums a lowercase address", () => {
      expect(tryNormalizeAddress(CHECKSUMMED.toLowerCase())).toBe(CHECKSUMMED);
    });

    it("trims surrounding whitespace", () => {
      expect(tryNormalizeAddress(`  ${CHECKSUMMED}  `)).toBe(CHECKSUMMED);
    });

    it.each([
      ["empty", ""],
      ["no prefix", "5aaeb6053f3e94c9b9a09f33669435e7ef1beaed"],
      ["too short", "0x1234"],
      ["non-hex", "0xzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzzz"],
      ["zero address", "0x0000000000000000000000000000000000000000"],
    ])("returns null for %s", (_label, value) => {
      expect(tryNormalizeAddress(value)).toBeNull();
    });
  });

  describe("normalizeAddress", () => {
    it("reports the field and raw value", () => {
      expect(() => normalizeAddress("nope", "charityId")).toThrow(
        InvalidAddressError
      );
      try {
        normalizeAddress("nope", "charityId");
      } catch (error) {
        expect(error).toMatchObject({
          code: "INVALID_ADDRESS",
          field: "charityId",
          value: "nope",
        });
      }
    });
  });

  describe("normalizeWithdrawalAsset", () => {
    it("passes the native asset marker through", () => {
      expect(normalizeWithdrawalAsset(NATIVE_ASSET, "asset")).toBe("native");
    });

    it("checksums token addresses", () => {
      expect(
        normalizeWithdrawalAsset(CHECKSUMMED.toLowerCase(), "asset")
      ).toBe(CHECKSUMMED);
    });

    it("rejects anything else", () => {
      expect(() => normalizeWithdrawalAsset("NATIVE", "asset")).toThrow(
        InvalidAddressError
      );
    });
  });
});

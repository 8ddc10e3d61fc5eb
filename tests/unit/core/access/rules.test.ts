// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/access/rules`
 * Purpose: Decision tests for the single-owner, multisig and role-based access policies.
 * Scope: Pure policy evaluation. Does not test the facade wiring.
 * Invariants: Case-insensitive comparison; multisig counts distinct signers only.
 * Side-effects: none
 * Links: src/core/access/rules.ts
 * @public
 */

import {
  DONOR_A,
  OWNER,
  SIGNER_A,
  SIGNER_B,
  SIGNER_C,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  assertAuthorized,
  createAccessPolicy,
  isUnauthorizedError,
  UnauthorizedError,
} from "@/core";

describe("core/access/rules", () => {
  describe("single_owner", () => {
    const policy = createAccessPolicy({ kind: "single_owner", owner: OWNER });

    it("authorizes the owner for every action", () => {
      expect(policy.isAuthorized("charity.verify", { caller: OWNER })).toBe(
        true
      );
      expect(
        policy.isAuthorized("funds.emergency_withdraw", { caller: OWNER })
      ).toBe(true);
    });

    it("denies everyone else", () => {
      expect(policy.isAuthorized("token.set_support", { caller: DONOR_A })).toBe(
        false
      );
    });
  });

  describe("multisig", () => {
    const policy = createAccessPolicy({
      kind: "multisig",
      signers: [SIGNER_A, SIGNER_B, SIGNER_C],
      threshold: 2,
    });

    it("denies a single signer", () => {
      expect(policy.isAuthorized("charity.verify", { caller: SIGNER_A })).toBe(
        false
      );
    });

    it("authorizes caller plus one approving signer", () => {
      expect(
        policy.isAuthorized("charity.verify", {
          caller: SIGNER_A,
          approvals: [SIGNER_C],
        })
      ).toBe(true);
    });

    it("counts a repeated signer once", () => {
      expect(
        policy.isAuthorized("charity.verify", {
          caller: SIGNER_A,
          approvals: [SIGNER_A, SIGNER_A],
        })
      ).toBe(false);
    });

    it("ignores approvals from non-signers", () => {
      expect(
        policy.isAuthorized("charity.verify", {
          caller: SIGNER_A,
          approvals: [DONOR_A, OWNER],
        })
      ).toBe(false);
    });

    it("accepts approvals even when the caller is not a signer", () => {
      expect(
        policy.isAuthorized("token.set_support", {
          caller: DONOR_A,
          approvals: [SIGNER_B, SIGNER_C],
        })
      ).toBe(true);
    });

    it.each([0, 4, 1.5])("rejects threshold %s at construction", (threshold) => {
      expect(() =>
        createAccessPolicy({
          kind: "multisig",
          signers: [SIGNER_A, SIGNER_B, SIGNER_C],
          threshold,
        })
      ).toThrow(/Multisig threshold/);
    });
  });

  describe("role_based", () => {
    const policy = createAccessPolicy({
      kind: "role_based",
      roles: {
        "charity.verify": [SIGNER_A],
        "token.set_support": [SIGNER_B],
      },
    });

    it("authorizes members for their own action only", () => {
      expect(policy.isAuthorized("charity.verify", { caller: SIGNER_A })).toBe(
        true
      );
      expect(
        policy.isAuthorized("token.set_support", { caller: SIGNER_A })
      ).toBe(false);
      expect(
        policy.isAuthorized("token.set_support", { caller: SIGNER_B })
      ).toBe(true);
    });

    it("denies actions with no configured role", () => {
      expect(
        policy.isAuthorized("funds.emergency_withdraw", { caller: SIGNER_A })
      ).toBe(false);
    });
  });

  describe("assertAuthorized", () => {
    it("throws UnauthorizedError naming the action and caller", () => {
      const policy = createAccessPolicy({ kind: "single_owner", owner: OWNER });
      let caught: unknown;
      try {
        assertAuthorized(policy, "charity.verify", { caller: DONOR_A });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnauthorizedError);
      expect(isUnauthorizedError(caught)).toBe(true);
      expect(caught).toMatchObject({
        code: "UNAUTHORIZED",
        action: "charity.verify",
        caller: DONOR_A,
      });
    });
  });
});

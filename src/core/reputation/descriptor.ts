// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/reputation/descriptor`
 * Purpose: Stateless projection of a credential into a self-contained JSON descriptor URI.
 * Scope: Formatting only. Does not read state or perform I/O.
 * Invariants: Output is `data:application/json;base64,` followed by base64 of UTF-8 JSON.
 * Side-effects: none
 * @public
 */

import type { ReputationCredential } from "./model";

export const DESCRIPTOR_URI_PREFIX = "data:application/json;base64,";

export interface CredentialDescriptor {
  readonly name: string;
  readonly description: string;
  readonly external_url?: string;
  readonly attributes: ReadonlyArray<{
    readonly trait_type: string;
    readonly value: string | number;
  }>;
}

export function describeCredential(
  credential: ReputationCredential
): CredentialDescriptor {
  return {
    name: `Donor Reputation #${credential.id}`,
    description: `Non-transferable donor reputation for ${credential.donor}`,
    ...(credential.metadataPointer
      ? { external_url: credential.metadataPointer }
      : {}),
    attributes: [
      { trait_type: "Tier", value: credential.tier },
      // bigint is not JSON-serialisable; totals travel as decimal strings
      { trait_type: "Total Donations", value: credential.totalDonations.toString() },
      { trait_type: "Donation Count", value: credential.donationCount },
    ],
  };
}

export function buildCredentialDescriptor(
  credential: ReputationCredential
): string {
  const json = JSON.stringify(describeCredential(credential));
  return `${DESCRIPTOR_URI_PREFIX}${Buffer.from(json, "utf8").toString("base64")}`;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/reputationIssuer`
 * Purpose: Non-transferable reputation credential issuance, updates and reads.
 * Scope: Orchestrates core reputation rules over the store. Does not decide when to mint (donationLedger does).
 * Invariants:
 * - At most one credential per donor; a second mint fails with TokenAlreadyMinted.
 * - Every ownership change goes through assertOwnershipChange; only mint (from = null) passes.
 * - getCredentialId never fails; getCredentialMetadata fails with CredentialNotFound.
 * Side-effects: IO (via LedgerStore)
 * @public
 */

import {
  type Address,
  applyDonation,
  assertOwnershipChange,
  buildCredentialDescriptor,
  CredentialNotFoundError,
  createCredential,
  normalizeAddress,
  type ReputationCredential,
  TokenAlreadyMintedError,
  tryNormalizeAddress,
} from "@/core";
import type { LedgerReader } from "@/ports";

import type { LedgerTx } from "./unitOfWork";

export async function mintFor(
  scope: LedgerTx,
  donor: Address,
  metadataPointer: string
): Promise<ReputationCredential> {
  const existing = await scope.tx.findCredentialByDonor(donor);
  if (existing) {
    throw new TokenAlreadyMintedError(donor, existing.id);
  }
  const id = await scope.tx.nextCredentialId();
  const credential = createCredential(id, donor, metadataPointer, scope.now);
  await scope.tx.insertCredential(credential);
  scope.emit({
    type: "credential.minted",
    credentialId: id,
    donor,
    tier: credential.tier,
  });
  return credential;
}

export async function updateFor(
  scope: LedgerTx,
  credentialId: bigint,
  amount: bigint
): Promise<ReputationCredential> {
  const credential = await scope.tx.findCredentialById(credentialId);
  if (!credential) {
    throw new CredentialNotFoundError(`credential ${credentialId}`);
  }
  const updated = applyDonation(credential, amount, scope.now);
  await scope.tx.updateCredential(updated);
  scope.emit({
    type: "credential.updated",
    credentialId,
    donor: updated.donor,
    totalDonations: updated.totalDonations,
    donationCount: updated.donationCount,
    tier: updated.tier,
  });
  return updated;
}

/**
 * Public transfer entry point. Both endpoints are identities, so the
 * ownership rule always rejects with TokenNotTransferable, whoever calls.
 */
export function transferCredential(input: {
  from: string;
  to: string;
  credentialId: bigint;
}): void {
  assertOwnershipChange(
    normalizeAddress(input.from, "from"),
    normalizeAddress(input.to, "to"),
    input.credentialId
  );
}

export async function getCredentialId(
  reader: LedgerReader,
  donorInput: string
): Promise<bigint | null> {
  const donor = tryNormalizeAddress(donorInput);
  if (!donor) return null;
  const credential = await reader.findCredentialByDonor(donor);
  return credential?.id ?? null;
}

export async function getCredentialMetadata(
  reader: LedgerReader,
  donorInput: string
): Promise<ReputationCredential> {
  const donor = normalizeAddress(donorInput, "donor");
  const credential = await reader.findCredentialByDonor(donor);
  if (!credential) {
    throw new CredentialNotFoundError(donor);
  }
  return credential;
}

export async function getCredentialDescriptor(
  reader: LedgerReader,
  donorInput: string
): Promise<string> {
  return buildCredentialDescriptor(
    await getCredentialMetadata(reader, donorInput)
  );
}

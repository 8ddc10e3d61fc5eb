// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/charityRegistry`
 * Purpose: Charity registration, verification and contribution accounting.
 * Scope: Orchestrates core charity rules over the store. Does not check authorization (facade does).
 * Invariants:
 * - A failed registration leaves any existing record untouched.
 * - Of concurrent registrations (or verifications) of one charity, exactly one succeeds.
 * - recordContribution is only reached from donate, after the transfer succeeded.
 * - Reads never fail; malformed ids read as absent.
 * Side-effects: IO (via LedgerStore)
 * @public
 */

import {
  type Address,
  applyContribution,
  type Charity,
  CharityAlreadyRegisteredError,
  CharityAlreadyVerifiedError,
  CharityNotRegisteredError,
  createCharity,
  markVerified,
  normalizeAddress,
  type RegisterCharityParams,
  tryNormalizeAddress,
  validateRegistration,
} from "@/core";
import type { LedgerReader } from "@/ports";

import type { LedgerTx } from "./unitOfWork";

export async function registerCharity(
  scope: LedgerTx,
  caller: Address,
  params: RegisterCharityParams
): Promise<Charity> {
  if (await scope.tx.findCharity(caller)) {
    throw new CharityAlreadyRegisteredError(caller);
  }
  const charity = createCharity(caller, validateRegistration(params), scope.now);
  if (!(await scope.tx.insertCharity(charity))) {
    // registered by a concurrent transaction since the lookup above
    throw new CharityAlreadyRegisteredError(caller);
  }
  scope.emit({
    type: "charity.registered",
    charityId: charity.id,
    name: charity.name,
    metadataPointer: charity.metadataPointer,
  });
  return charity;
}

export async function verifyCharity(
  scope: LedgerTx,
  charityIdInput: string
): Promise<Charity> {
  const charityId = normalizeAddress(charityIdInput, "charityId");
  const charity = await scope.tx.findCharity(charityId);
  if (!charity) {
    throw new CharityNotRegisteredError(charityId);
  }
  const verified = markVerified(charity, scope.now);
  if (!(await scope.tx.markCharityVerified(charityId, verified.updatedAt))) {
    throw new CharityAlreadyVerifiedError(charityId);
  }
  scope.emit({ type: "charity.verified", charityId });
  return verified;
}

export async function recordContribution(
  scope: LedgerTx,
  charityId: Address,
  donor: Address,
  amount: bigint
): Promise<Charity> {
  const charity = await scope.tx.findCharity(charityId);
  if (!charity) {
    throw new CharityNotRegisteredError(charityId);
  }
  const previous = await scope.tx.getContribution(charityId, donor);
  const updated = applyContribution(charity, previous, amount, scope.now);
  await scope.tx.updateCharity(updated);
  await scope.tx.upsertContribution(charityId, donor, previous + amount);
  return updated;
}

export async function getCharity(
  reader: LedgerReader,
  charityIdInput: string
): Promise<Charity | null> {
  const charityId = tryNormalizeAddress(charityIdInput);
  return charityId ? reader.findCharity(charityId) : null;
}

export async function getCharityContribution(
  reader: LedgerReader,
  charityIdInput: string,
  donorInput: string
): Promise<bigint> {
  const charityId = tryNormalizeAddress(charityIdInput);
  const donor = tryNormalizeAddress(donorInput);
  if (!charityId || !donor) return 0n;
  return reader.getContribution(charityId, donor);
}

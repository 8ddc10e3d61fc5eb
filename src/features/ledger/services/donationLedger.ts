// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/services/donationLedger`
 * Purpose: The donate flow and donation reads.
 * Scope: Validation, external transfer, record append, charity accounting and credential mint-or-update inside one transaction. Does not guard or authorize (facade does).
 * Invariants:
 * - All checks run before the transfer; all writes run after it succeeds.
 * - A failed or throwing transfer surfaces as TransferFailed and nothing is written.
 * - The first donation mints the credential and then applies the amount, so it is counted.
 * - Event order: credential.minted?, credential.updated, donation.made.
 * Side-effects: IO (via LedgerStore and ValueTransferPort)
 * @public
 */

import {
  type Address,
  assertValidAmount,
  assertValidMessage,
  CharityNotRegisteredError,
  CharityNotVerifiedError,
  type DonationRecord,
  normalizeAddress,
  TokenNotSupportedError,
  TransferFailedError,
  tryNormalizeAddress,
} from "@/core";
import type {
  LedgerReader,
  TransferResult,
  ValueTransferPort,
} from "@/ports";

import { recordContribution } from "./charityRegistry";
import { mintFor, updateFor } from "./reputationIssuer";
import type { LedgerTx } from "./unitOfWork";

export interface DonateInput {
  charityId: string;
  tokenId: string;
  amount: bigint;
  message: string;
}

export async function donate(
  scope: LedgerTx,
  transfers: ValueTransferPort,
  donor: Address,
  input: DonateInput
): Promise<DonationRecord> {
  const tokenId = normalizeAddress(input.tokenId, "tokenId");
  const { amount, message } = input;

  const support = await scope.tx.getTokenSupport(tokenId);
  if (!support?.supported) {
    throw new TokenNotSupportedError(tokenId);
  }
  assertValidAmount(amount);
  assertValidMessage(message);

  const charityId = normalizeAddress(input.charityId, "charityId");
  const charity = await scope.tx.findCharity(charityId);
  if (!charity) {
    throw new CharityNotRegisteredError(charityId);
  }
  if (!charity.verified) {
    throw new CharityNotVerifiedError(charityId);
  }

  let transferred: TransferResult;
  try {
    transferred = await transfers.transferFrom({
      token: tokenId,
      from: donor,
      to: charityId,
      amount,
    });
  } catch (error) {
    throw TransferFailedError.fromError(error);
  }
  if (!transferred.ok) {
    throw new TransferFailedError(transferred.reason);
  }

  const record: DonationRecord = {
    id: await scope.tx.nextDonationId(),
    donor,
    charityId,
    amount,
    tokenId,
    message,
    createdAt: scope.now,
  };
  await scope.tx.insertDonation(record);

  await recordContribution(scope, charityId, donor, amount);

  const credential =
    (await scope.tx.findCredentialByDonor(donor)) ??
    (await mintFor(scope, donor, ""));
  await updateFor(scope, credential.id, amount);

  scope.emit({
    type: "donation.made",
    donationId: record.id,
    donor,
    charityId,
    tokenId,
    amount,
    message,
    createdAt: record.createdAt,
  });
  return record;
}

/** Accepts bigint, decimal string or safe integer; anything else reads as absent */
function toDonationId(value: bigint | string | number): bigint | null {
  if (typeof value === "bigint") return value;
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? BigInt(value) : null;
  }
  return /^\d+$/.test(value.trim()) ? BigInt(value.trim()) : null;
}

export async function getDonation(
  reader: LedgerReader,
  donationId: bigint | string | number
): Promise<DonationRecord | null> {
  const id = toDonationId(donationId);
  return id === null ? null : reader.findDonation(id);
}

export async function getCharityDonationIds(
  reader: LedgerReader,
  charityIdInput: string
): Promise<bigint[]> {
  const charityId = tryNormalizeAddress(charityIdInput);
  return charityId ? reader.listDonationIdsByCharity(charityId) : [];
}

export async function getDonorDonationIds(
  reader: LedgerReader,
  donorInput: string
): Promise<bigint[]> {
  const donor = tryNormalizeAddress(donorInput);
  return donor ? reader.listDonationIdsByDonor(donor) : [];
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/charities/rules`
 * Purpose: Registration validation and the pure state transitions of a charity record.
 * Scope: Pure functions returning new records. Does not perform I/O.
 * Invariants:
 * - New charities start unverified with zero aggregates.
 * - verify is one-directional; there is no un-verify transition.
 * - donorCount grows only when a donor's previous contribution was zero.
 * Side-effects: none
 * @public
 */

import { InvalidMetadataError } from "../reputation/errors";
import { InvalidAddressError } from "../tokens/errors";
import type { Address } from "../tokens/model";
import { CharityAlreadyVerifiedError } from "./errors";
import type { Charity, RegisterCharityParams } from "./model";

export const MAX_CHARITY_NAME_CHARS = 128;
export const MAX_CHARITY_DESCRIPTION_CHARS = 2048;
export const MAX_METADATA_POINTER_CHARS = 512;

/**
 * Validates and trims registration fields.
 * Empty name or metadata pointer is reported as InvalidAddress; over-long fields are InvalidMetadata.
 */
export function validateRegistration(
  params: RegisterCharityParams
): RegisterCharityParams {
  const name = params.name.trim();
  const metadataPointer = params.metadataPointer.trim();
  const description = params.description;

  if (name.length === 0) {
    throw new InvalidAddressError("name", params.name);
  }
  if (metadataPointer.length === 0) {
    throw new InvalidAddressError("metadataPointer", params.metadataPointer);
  }
  if (name.length > MAX_CHARITY_NAME_CHARS) {
    throw new InvalidMetadataError("name", MAX_CHARITY_NAME_CHARS);
  }
  if (description.length > MAX_CHARITY_DESCRIPTION_CHARS) {
    throw new InvalidMetadataError("description", MAX_CHARITY_DESCRIPTION_CHARS);
  }
  if (metadataPointer.length > MAX_METADATA_POINTER_CHARS) {
    throw new InvalidMetadataError("metadataPointer", MAX_METADATA_POINTER_CHARS);
  }

  return { name, description, metadataPointer };
}

export function createCharity(
  id: Address,
  params: RegisterCharityParams,
  now: Date
): Charity {
  return {
    id,
    name: params.name,
    description: params.description,
    metadataPointer: params.metadataPointer,
    verified: false,
    totalDonations: 0n,
    donorCount: 0,
    createdAt: now,
    updatedAt: now,
  };
}

export function markVerified(charity: Charity, now: Date): Charity {
  if (charity.verified) {
    throw new CharityAlreadyVerifiedError(charity.id);
  }
  return { ...charity, verified: true, updatedAt: now };
}

/**
 * Applies one donation to the charity aggregates.
 *
 * @param previousContribution - The donor's cumulative contribution before this donation
 */
export function applyContribution(
  charity: Charity,
  previousContribution: bigint,
  amount: bigint,
  now: Date
): Charity {
  return {
    ...charity,
    totalDonations: charity.totalDonations + amount,
    donorCount:
      previousContribution === 0n ? charity.donorCount + 1 : charity.donorCount,
    updatedAt: now,
  };
}

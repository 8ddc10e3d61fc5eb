// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/charities/public`
 * Purpose: Public API for the charity registry domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export {
  CharityAlreadyRegisteredError,
  CharityAlreadyVerifiedError,
  CharityNotRegisteredError,
  CharityNotVerifiedError,
  isCharityAlreadyRegisteredError,
  isCharityAlreadyVerifiedError,
  isCharityNotRegisteredError,
  isCharityNotVerifiedError,
} from "./errors";
export type {
  Charity,
  CharityContribution,
  RegisterCharityParams,
} from "./model";
export {
  applyContribution,
  createCharity,
  MAX_CHARITY_DESCRIPTION_CHARS,
  MAX_CHARITY_NAME_CHARS,
  MAX_METADATA_POINTER_CHARS,
  markVerified,
  validateRegistration,
} from "./rules";

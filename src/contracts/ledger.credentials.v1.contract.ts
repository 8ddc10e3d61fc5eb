// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ledger.credentials.v1.contract`
 * Purpose: Operation contracts for reputation credential reads and the (always rejected) transfer.
 * Scope: Zod input schemas. Does not contain business logic.
 * Invariants: transferCredential exists only to be rejected; no input shape makes it succeed.
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import {
  AmountInputSchema,
  IdentityInputSchema,
} from "./ledger.shared.v1.contract";

export const getCredentialIdOperation = {
  id: "ledger.credentials.get-id.v1",
  summary: "Look up a donor's credential id (null when none)",
  input: z.object({ donor: z.string() }),
  addressFields: [],
} as const;

export const getCredentialMetadataOperation = {
  id: "ledger.credentials.get-metadata.v1",
  summary: "Read a donor's credential",
  input: z.object({ donor: IdentityInputSchema }),
  addressFields: ["donor"],
} as const;

export const getCredentialDescriptorOperation = {
  id: "ledger.credentials.get-descriptor.v1",
  summary: "Render a donor's credential as a data: URI JSON descriptor",
  input: z.object({ donor: IdentityInputSchema }),
  addressFields: ["donor"],
} as const;

export const transferCredentialOperation = {
  id: "ledger.credentials.transfer.v1",
  summary: "Attempt to move a credential between identities",
  input: z.object({
    from: IdentityInputSchema,
    to: IdentityInputSchema,
    credentialId: AmountInputSchema,
  }),
  addressFields: ["from", "to"],
} as const;

export type GetCredentialIdInput = z.input<
  typeof getCredentialIdOperation.input
>;
export type GetCredentialMetadataInput = z.input<
  typeof getCredentialMetadataOperation.input
>;
export type GetCredentialDescriptorInput = z.input<
  typeof getCredentialDescriptorOperation.input
>;
export type TransferCredentialInput = z.input<
  typeof transferCredentialOperation.input
>;

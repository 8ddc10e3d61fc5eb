// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: Drizzle schema for the donation ledger.
 * Scope: Defines token support, charities, contributions, donations, credentials and id counters. Does not handle connections or migrations.
 * Invariants:
 * - Amounts are numeric(78,0) (uint256 range), mapped to bigint by the store adapter.
 * - Addresses are stored checksummed; charity id and credential donor are unique.
 * - Ids come from sequences, which do not roll back; an aborted donation burns its id.
 * - ledger_credentials.donor is never updated after insert.
 * Side-effects: none (schema definitions only)
 * Links: src/adapters/server/ledger/drizzle-ledger-store.adapter.ts
 * @public
 */

import {
  bigint,
  boolean,
  index,
  integer,
  numeric,
  pgSequence,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

import { REPUTATION_TIERS } from "@/core";

const uint256 = (name: string) => numeric(name, { precision: 78, scale: 0 });

export const ledgerTokenSupport = pgTable("ledger_token_support", {
  tokenId: text("token_id").primaryKey(),
  supported: boolean("supported").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

export const ledgerCharities = pgTable("ledger_charities", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description").notNull(),
  metadataPointer: text("metadata_pointer").notNull(),
  verified: boolean("verified").notNull().default(false),
  totalDonations: uint256("total_donations").notNull().default("0"),
  donorCount: integer("donor_count").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

/** Per-donor cumulative contribution, independent of the charity row */
export const ledgerCharityContributions = pgTable(
  "ledger_charity_contributions",
  {
    charityId: text("charity_id")
      .notNull()
      .references(() => ledgerCharities.id),
    donor: text("donor").notNull(),
    amount: uint256("amount").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.charityId, table.donor] }),
  })
);

export const ledgerDonations = pgTable(
  "ledger_donations",
  {
    id: bigint("id", { mode: "bigint" }).primaryKey(),
    donor: text("donor").notNull(),
    charityId: text("charity_id")
      .notNull()
      .references(() => ledgerCharities.id),
    amount: uint256("amount").notNull(),
    tokenId: text("token_id").notNull(),
    message: text("message").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    charityIdx: index("ledger_donations_charity_idx").on(
      table.charityId,
      table.id
    ),
    donorIdx: index("ledger_donations_donor_idx").on(table.donor, table.id),
  })
);

export const ledgerCredentials = pgTable("ledger_credentials", {
  id: bigint("id", { mode: "bigint" }).primaryKey(),
  donor: text("donor").notNull().unique(),
  totalDonations: uint256("total_donations").notNull(),
  donationCount: integer("donation_count").notNull(),
  tier: text("tier", { enum: REPUTATION_TIERS }).notNull(),
  lastDonationAt: timestamp("last_donation_at", { withTimezone: true }),
  metadataPointer: text("metadata_pointer").notNull().default(""),
  mintedAt: timestamp("minted_at", { withTimezone: true }).notNull(),
});

export const ledgerDonationIdSeq = pgSequence("ledger_donation_id_seq", {
  startWith: 0,
  minValue: 0,
});

export const ledgerCredentialIdSeq = pgSequence("ledger_credential_id_seq", {
  startWith: 1,
  minValue: 1,
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/drizzle-ledger-store`
 * Purpose: Drizzle-based implementation of LedgerStore for PostgreSQL persistence.
 * Scope: Row mapping and queries for ledger tables. Does not validate business rules.
 * Invariants:
 * - transaction() wraps db.transaction; any throw rolls back every write made through the writer.
 * - numeric columns are read back as strings and converted with BigInt().
 * - Ids come from sequences (nextval is not transactional), so rolled-back ids are never reused.
 * - updateCredential never writes the donor column.
 * - insertCharity/markCharityVerified resolve races in the statement (ON CONFLICT DO NOTHING,
 *   UPDATE ... WHERE verified = false) and report a lost race as false.
 * Side-effects: IO (database operations)
 * Links: Implements LedgerStore port; schema in src/shared/db/schema.ts
 * @public
 */

import { and, asc, eq, sql } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";

import type { Database } from "@/adapters/server/db/client";
import type {
  Address,
  Charity,
  DonationRecord,
  ReputationCredential,
  TokenSupportEntry,
} from "@/core";
import type { LedgerStore, LedgerWriter } from "@/ports";
import type * as schema from "@/shared/db";
import {
  ledgerCharities,
  ledgerCharityContributions,
  ledgerCredentials,
  ledgerDonations,
  ledgerTokenSupport,
} from "@/shared/db";

/** Satisfied by both the root database and a transaction handle */
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

type CharityRow = typeof ledgerCharities.$inferSelect;
type DonationRow = typeof ledgerDonations.$inferSelect;
type CredentialRow = typeof ledgerCredentials.$inferSelect;

function asAddress(value: string): Address {
  if (!value.startsWith("0x")) {
    throw new Error(`Stored identity is not an address: ${value}`);
  }
  return `0x${value.slice(2)}`;
}

function mapCharity(row: CharityRow): Charity {
  return {
    id: asAddress(row.id),
    name: row.name,
    description: row.description,
    metadataPointer: row.metadataPointer,
    verified: row.verified,
    totalDonations: BigInt(row.totalDonations),
    donorCount: row.donorCount,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function mapDonation(row: DonationRow): DonationRecord {
  return {
    id: row.id,
    donor: asAddress(row.donor),
    charityId: asAddress(row.charityId),
    amount: BigInt(row.amount),
    tokenId: asAddress(row.tokenId),
    message: row.message,
    createdAt: row.createdAt,
  };
}

function mapCredential(row: CredentialRow): ReputationCredential {
  return {
    id: row.id,
    donor: asAddress(row.donor),
    totalDonations: BigInt(row.totalDonations),
    donationCount: row.donationCount,
    tier: row.tier,
    lastDonationAt: row.lastDonationAt,
    metadataPointer: row.metadataPointer,
    mintedAt: row.mintedAt,
  };
}

/**
 * Query set bound to one executor (root db for reads, `tx` inside transactions).
 */
class DrizzleLedgerSession implements LedgerWriter {
  constructor(private readonly exec: Executor) {}

  async getTokenSupport(tokenId: Address): Promise<TokenSupportEntry | null> {
    const [row] = await this.exec
      .select()
      .from(ledgerTokenSupport)
      .where(eq(ledgerTokenSupport.tokenId, tokenId))
      .limit(1);
    if (!row) return null;
    return {
      tokenId: asAddress(row.tokenId),
      supported: row.supported,
      updatedAt: row.updatedAt,
    };
  }

  async findCharity(charityId: Address): Promise<Charity | null> {
    const [row] = await this.exec
      .select()
      .from(ledgerCharities)
      .where(eq(ledgerCharities.id, charityId))
      .limit(1);
    return row ? mapCharity(row) : null;
  }

  async getContribution(charityId: Address, donor: Address): Promise<bigint> {
    const [row] = await this.exec
      .select({ amount: ledgerCharityContributions.amount })
      .from(ledgerCharityContributions)
      .where(
        and(
          eq(ledgerCharityContributions.charityId, charityId),
          eq(ledgerCharityContributions.donor, donor)
        )
      )
      .limit(1);
    return row ? BigInt(row.amount) : 0n;
  }

  async findDonation(donationId: bigint): Promise<DonationRecord | null> {
    const [row] = await this.exec
      .select()
      .from(ledgerDonations)
      .where(eq(ledgerDonations.id, donationId))
      .limit(1);
    return row ? mapDonation(row) : null;
  }

  async listDonationIdsByCharity(charityId: Address): Promise<bigint[]> {
    const rows = await this.exec
      .select({ id: ledgerDonations.id })
      .from(ledgerDonations)
      .where(eq(ledgerDonations.charityId, charityId))
      .orderBy(asc(ledgerDonations.id));
    return rows.map((row) => row.id);
  }

  async listDonationIdsByDonor(donor: Address): Promise<bigint[]> {
    const rows = await this.exec
      .select({ id: ledgerDonations.id })
      .from(ledgerDonations)
      .where(eq(ledgerDonations.donor, donor))
      .orderBy(asc(ledgerDonations.id));
    return rows.map((row) => row.id);
  }

  async findCredentialByDonor(
    donor: Address
  ): Promise<ReputationCredential | null> {
    const [row] = await this.exec
      .select()
      .from(ledgerCredentials)
      .where(eq(ledgerCredentials.donor, donor))
      .limit(1);
    return row ? mapCredential(row) : null;
  }

  async findCredentialById(
    credentialId: bigint
  ): Promise<ReputationCredential | null> {
    const [row] = await this.exec
      .select()
      .from(ledgerCredentials)
      .where(eq(ledgerCredentials.id, credentialId))
      .limit(1);
    return row ? mapCredential(row) : null;
  }

  async setTokenSupport(entry: TokenSupportEntry): Promise<void> {
    await this.exec
      .insert(ledgerTokenSupport)
      .values(entry)
      .onConflictDoUpdate({
        target: ledgerTokenSupport.tokenId,
        set: { supported: entry.supported, updatedAt: entry.updatedAt },
      });
  }

  async insertCharity(charity: Charity): Promise<boolean> {
    const inserted = await this.exec
      .insert(ledgerCharities)
      .values({
        ...charity,
        totalDonations: charity.totalDonations.toString(),
      })
      .onConflictDoNothing({ target: ledgerCharities.id })
      .returning({ id: ledgerCharities.id });
    return inserted.length > 0;
  }

  async markCharityVerified(
    charityId: Address,
    updatedAt: Date
  ): Promise<boolean> {
    const updated = await this.exec
      .update(ledgerCharities)
      .set({ verified: true, updatedAt })
      .where(
        and(
          eq(ledgerCharities.id, charityId),
          eq(ledgerCharities.verified, false)
        )
      )
      .returning({ id: ledgerCharities.id });
    return updated.length > 0;
  }

  async updateCharity(charity: Charity): Promise<void> {
    await this.exec
      .update(ledgerCharities)
      .set({
        totalDonations: charity.totalDonations.toString(),
        donorCount: charity.donorCount,
        updatedAt: charity.updatedAt,
      })
      .where(eq(ledgerCharities.id, charity.id));
  }

  async upsertContribution(
    charityId: Address,
    donor: Address,
    amount: bigint
  ): Promise<void> {
    await this.exec
      .insert(ledgerCharityContributions)
      .values({ charityId, donor, amount: amount.toString() })
      .onConflictDoUpdate({
        target: [
          ledgerCharityContributions.charityId,
          ledgerCharityContributions.donor,
        ],
        set: { amount: amount.toString() },
      });
  }

  nextDonationId(): Promise<bigint> {
    return this.nextval("ledger_donation_id_seq");
  }

  async insertDonation(record: DonationRecord): Promise<void> {
    await this.exec.insert(ledgerDonations).values({
      ...record,
      amount: record.amount.toString(),
    });
  }

  nextCredentialId(): Promise<bigint> {
    return this.nextval("ledger_credential_id_seq");
  }

  async insertCredential(credential: ReputationCredential): Promise<void> {
    await this.exec.insert(ledgerCredentials).values({
      ...credential,
      totalDonations: credential.totalDonations.toString(),
    });
  }

  async updateCredential(credential: ReputationCredential): Promise<void> {
    await this.exec
      .update(ledgerCredentials)
      .set({
        totalDonations: credential.totalDonations.toString(),
        donationCount: credential.donationCount,
        tier: credential.tier,
        lastDonationAt: credential.lastDonationAt,
      })
      .where(eq(ledgerCredentials.id, credential.id));
  }

  private async nextval(
    sequence: "ledger_donation_id_seq" | "ledger_credential_id_seq"
  ): Promise<bigint> {
    const [row] = await this.exec.execute(
      sql`select nextval(${sequence})::text as value`
    );
    const value = row?.value;
    if (typeof value !== "string") {
      throw new Error(`nextval(${sequence}) returned no value`);
    }
    return BigInt(value);
  }
}

export class DrizzleLedgerStore implements LedgerStore {
  private readonly reads: DrizzleLedgerSession;

  constructor(private readonly db: Database) {
    this.reads = new DrizzleLedgerSession(db);
  }

  transaction<T>(fn: (tx: LedgerWriter) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleLedgerSession(tx)));
  }

  getTokenSupport(tokenId: Address): Promise<TokenSupportEntry | null> {
    return this.reads.getTokenSupport(tokenId);
  }

  findCharity(charityId: Address): Promise<Charity | null> {
    return this.reads.findCharity(charityId);
  }

  getContribution(charityId: Address, donor: Address): Promise<bigint> {
    return this.reads.getContribution(charityId, donor);
  }

  findDonation(donationId: bigint): Promise<DonationRecord | null> {
    return this.reads.findDonation(donationId);
  }

  listDonationIdsByCharity(charityId: Address): Promise<bigint[]> {
    return this.reads.listDonationIdsByCharity(charityId);
  }

  listDonationIdsByDonor(donor: Address): Promise<bigint[]> {
    return this.reads.listDonationIdsByDonor(donor);
  }

  findCredentialByDonor(donor: Address): Promise<ReputationCredential | null> {
    return this.reads.findCredentialByDonor(donor);
  }

  findCredentialById(
    credentialId: bigint
  ): Promise<ReputationCredential | null> {
    return this.reads.findCredentialById(credentialId);
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ledger/ledger.facade`
 * Purpose: Single entry point for the donation ledger: contracts in, domain results out.
 * Scope: Input parsing, authorization, single-entry guarding, transactions, post-commit event publishing, logs and metrics. Does not contain business rules (services/core do).
 * Invariants:
 *   - Guarded operations (donate, emergencyWithdraw) check the guard before anything else.
 *   - Privileged operations authorize the caller before validating their input.
 *   - Events are published only after the transaction commits, in emission order.
 *   - Reads never fail except getCredentialMetadata/getCredentialDescriptor (CredentialNotFound).
 * Side-effects: IO (via injected ports), logging, metrics
 * Links: src/contracts/ledger.*.v1.contract.ts, services/*
 * @public
 */

import type { z } from "zod";

import {
  getCharityContributionOperation,
  getCharityOperation,
  registerCharityOperation,
  verifyCharityOperation,
  type GetCharityContributionInput,
  type GetCharityInput,
  type RegisterCharityInput,
  type VerifyCharityInput,
} from "@/contracts/ledger.charities.v1.contract";
import {
  getCredentialDescriptorOperation,
  getCredentialIdOperation,
  getCredentialMetadataOperation,
  transferCredentialOperation,
  type GetCredentialDescriptorInput,
  type GetCredentialIdInput,
  type GetCredentialMetadataInput,
  type TransferCredentialInput,
} from "@/contracts/ledger.credentials.v1.contract";
import {
  donateOperation,
  getCharityDonationIdsOperation,
  getDonationOperation,
  getDonorDonationIdsOperation,
  type DonateInput,
  type GetCharityDonationIdsInput,
  type GetDonationInput,
  type GetDonorDonationIdsInput,
} from "@/contracts/ledger.donations.v1.contract";
import {
  emergencyWithdrawOperation,
  type EmergencyWithdrawInput,
} from "@/contracts/ledger.funds.v1.contract";
import type { CallerContextInput } from "@/contracts/ledger.shared.v1.contract";
import {
  isTokenSupportedOperation,
  setTokenSupportOperation,
  type IsTokenSupportedInput,
  type SetTokenSupportInput,
} from "@/contracts/ledger.tokens.v1.contract";
import {
  type AccessPolicy,
  assertAuthorized,
  type CallerContext,
  type Charity,
  type DonationRecord,
  isLedgerDomainError,
  type PrivilegedAction,
  type ReputationCredential,
} from "@/core";
import type {
  Clock,
  EventPublisher,
  LedgerStore,
  ValueTransferPort,
} from "@/ports";
import {
  createOperationContext,
  EVENT_NAMES,
  failureCode,
  ledgerCredentialsMintedTotal,
  ledgerDonationsTotal,
  ledgerOperationDurationMs,
  ledgerOperationFailuresTotal,
  ledgerOperationsTotal,
  type Logger,
  logEvent,
  type OperationContext,
} from "@/shared/observability";

import {
  type OperationContract,
  parseCallerContext,
  parseOperationInput,
} from "./parseInput";
import * as charities from "./services/charityRegistry";
import * as donations from "./services/donationLedger";
import { emergencyWithdraw } from "./services/emergencyWithdraw";
import { ReentrancyGuard } from "./services/reentrancyGuard";
import * as reputation from "./services/reputationIssuer";
import * as tokens from "./services/tokenSupport";
import { type LedgerTx, runLedgerTransaction } from "./services/unitOfWork";

export interface DonationLedgerDeps {
  readonly store: LedgerStore;
  readonly transfers: ValueTransferPort;
  readonly clock: Clock;
  readonly access: AccessPolicy;
  readonly events: EventPublisher;
  readonly log: Logger;
  /** Shared guard; a fresh one is created when omitted */
  readonly guard?: ReentrancyGuard;
}

/** Reads do not require an identity; reqId only correlates logs */
export type ReadContextInput = Partial<CallerContextInput>;

export interface DonationLedger {
  // Token support registry
  setTokenSupport(
    ctx: CallerContextInput,
    input: SetTokenSupportInput
  ): Promise<void>;
  isTokenSupported(
    ctx: ReadContextInput,
    input: IsTokenSupportedInput
  ): Promise<boolean>;

  // Charity registry
  registerCharity(
    ctx: CallerContextInput,
    input: RegisterCharityInput
  ): Promise<Charity>;
  verifyCharity(
    ctx: CallerContextInput,
    input: VerifyCharityInput
  ): Promise<Charity>;
  getCharity(ctx: ReadContextInput, input: GetCharityInput): Promise<Charity | null>;
  getCharityContribution(
    ctx: ReadContextInput,
    input: GetCharityContributionInput
  ): Promise<bigint>;

  // Donation ledger
  /** @returns the new donation id */
  donate(ctx: CallerContextInput, input: DonateInput): Promise<bigint>;
  getDonation(
    ctx: ReadContextInput,
    input: GetDonationInput
  ): Promise<DonationRecord | null>;
  getCharityDonationIds(
    ctx: ReadContextInput,
    input: GetCharityDonationIdsInput
  ): Promise<bigint[]>;
  getDonorDonationIds(
    ctx: ReadContextInput,
    input: GetDonorDonationIdsInput
  ): Promise<bigint[]>;

  // Reputation credentials
  getCredentialId(
    ctx: ReadContextInput,
    input: GetCredentialIdInput
  ): Promise<bigint | null>;
  getCredentialMetadata(
    ctx: ReadContextInput,
    input: GetCredentialMetadataInput
  ): Promise<ReputationCredential>;
  getCredentialDescriptor(
    ctx: ReadContextInput,
    input: GetCredentialDescriptorInput
  ): Promise<string>;
  /** Always rejects with TokenNotTransferable for well-formed input */
  transferCredential(
    ctx: CallerContextInput,
    input: TransferCredentialInput
  ): Promise<void>;

  // Fund recovery
  emergencyWithdraw(
    ctx: CallerContextInput,
    input: EmergencyWithdrawInput
  ): Promise<{ txHash: string }>;
}

interface CommandOptions {
  readonly action?: PrivilegedAction;
  readonly guarded?: boolean;
}

export function createDonationLedger(deps: DonationLedgerDeps): DonationLedger {
  const guard = deps.guard ?? new ReentrancyGuard();

  async function instrument<T>(
    octx: OperationContext,
    fn: () => Promise<T>
  ): Promise<T> {
    const { operation } = octx;
    const startedAt = performance.now();
    try {
      const result = await fn();
      ledgerOperationsTotal.inc({ operation, outcome: "ok" });
      return result;
    } catch (error) {
      const code = failureCode(error);
      ledgerOperationsTotal.inc({ operation, outcome: "error" });
      ledgerOperationFailuresTotal.inc({ operation, code });
      if (isLedgerDomainError(error)) {
        octx.log.warn(
          { event: EVENT_NAMES.LEDGER_OPERATION_FAILED, code },
          error.message
        );
      } else {
        octx.log.error(
          { event: EVENT_NAMES.INV_UNKNOWN_ERROR_IN_LEDGER_OPERATION, err: error },
          "ledger operation failed with a non-domain error"
        );
      }
      throw error;
    } finally {
      ledgerOperationDurationMs.observe(
        { operation },
        performance.now() - startedAt
      );
    }
  }

  /** Mutating operation: guard → caller → authorize → input → transaction → publish */
  function command<S extends z.ZodTypeAny, T>(
    operation: string,
    contract: OperationContract<S>,
    options: CommandOptions,
    work: (
      scope: LedgerTx,
      caller: CallerContext,
      input: z.output<S>
    ) => Promise<T>
  ): (rawCtx: CallerContextInput, rawInput: z.input<S>) => Promise<T> {
    return (rawCtx, rawInput) => {
      const octx = createOperationContext(
        { baseLog: deps.log },
        { operation, reqId: rawCtx.reqId, caller: rawCtx.caller }
      );
      const body = async (): Promise<T> => {
        const caller = parseCallerContext(rawCtx);
        if (options.action) {
          assertAuthorized(deps.access, options.action, caller);
        }
        const input = parseOperationInput(contract, rawInput);
        const { result, events } = await runLedgerTransaction(deps, (scope) =>
          work(scope, caller, input)
        );

        deps.events.publish(events, { reqId: octx.reqId });
        for (const event of events) {
          if (event.type === "donation.made") ledgerDonationsTotal.inc();
          if (event.type === "credential.minted")
            ledgerCredentialsMintedTotal.inc();
        }
        logEvent(octx.log, EVENT_NAMES.LEDGER_OPERATION_COMPLETED, {
          reqId: octx.reqId,
          operation,
          events: events.length,
        });
        return result;
      };

      return instrument(octx, () =>
        options.guarded ? guard.run(operation, body) : body()
      );
    };
  }

  /** Read-only operation: input → reader; no transaction, no events */
  function query<S extends z.ZodTypeAny, T>(
    operation: string,
    contract: OperationContract<S>,
    work: (input: z.output<S>) => Promise<T>
  ): (rawCtx: ReadContextInput, rawInput: z.input<S>) => Promise<T> {
    return (rawCtx, rawInput) => {
      const octx = createOperationContext(
        { baseLog: deps.log },
        { operation, reqId: rawCtx.reqId }
      );
      return instrument(octx, () =>
        work(parseOperationInput(contract, rawInput))
      );
    };
  }

  const { store, transfers } = deps;

  return {
    setTokenSupport: command(
      "setTokenSupport",
      setTokenSupportOperation,
      { action: "token.set_support" },
      async (scope, _caller, input) => {
        await tokens.setTokenSupport(scope, input);
      }
    ),
    isTokenSupported: query(
      "isTokenSupported",
      isTokenSupportedOperation,
      (input) => tokens.isTokenSupported(store, input.tokenId)
    ),

    registerCharity: command(
      "registerCharity",
      registerCharityOperation,
      {},
      (scope, caller, input) =>
        charities.registerCharity(scope, caller.caller, input)
    ),
    verifyCharity: command(
      "verifyCharity",
      verifyCharityOperation,
      { action: "charity.verify" },
      (scope, _caller, input) => charities.verifyCharity(scope, input.charityId)
    ),
    getCharity: query("getCharity", getCharityOperation, (input) =>
      charities.getCharity(store, input.charityId)
    ),
    getCharityContribution: query(
      "getCharityContribution",
      getCharityContributionOperation,
      (input) =>
        charities.getCharityContribution(store, input.charityId, input.donor)
    ),

    donate: command(
      "donate",
      donateOperation,
      { guarded: true },
      async (scope, caller, input) => {
        const record = await donations.donate(
          scope,
          transfers,
          caller.caller,
          input
        );
        return record.id;
      }
    ),
    getDonation: query("getDonation", getDonationOperation, (input) =>
      donations.getDonation(store, input.donationId)
    ),
    getCharityDonationIds: query(
      "getCharityDonationIds",
      getCharityDonationIdsOperation,
      (input) => donations.getCharityDonationIds(store, input.charityId)
    ),
    getDonorDonationIds: query(
      "getDonorDonationIds",
      getDonorDonationIdsOperation,
      (input) => donations.getDonorDonationIds(store, input.donor)
    ),

    getCredentialId: query(
      "getCredentialId",
      getCredentialIdOperation,
      (input) => reputation.getCredentialId(store, input.donor)
    ),
    getCredentialMetadata: query(
      "getCredentialMetadata",
      getCredentialMetadataOperation,
      (input) => reputation.getCredentialMetadata(store, input.donor)
    ),
    getCredentialDescriptor: query(
      "getCredentialDescriptor",
      getCredentialDescriptorOperation,
      (input) => reputation.getCredentialDescriptor(store, input.donor)
    ),
    transferCredential: command(
      "transferCredential",
      transferCredentialOperation,
      {},
      async (_scope, _caller, input) => {
        reputation.transferCredential(input);
      }
    ),

    emergencyWithdraw: command(
      "emergencyWithdraw",
      emergencyWithdrawOperation,
      { action: "funds.emergency_withdraw", guarded: true },
      (scope, _caller, input) => emergencyWithdraw(scope, transfers, input)
    ),
  };
}

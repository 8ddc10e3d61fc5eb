// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root for the donation ledger with environment-based adapter selection.
 * Scope: Wire adapters to ports and build the ledger facade. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; access policy fixed at construction.
 * Side-effects: IO (initializes logger, emits startup log, opens DB pool lazily in production)
 * Notes: APP_ENV=test wires the in-memory store and the shared fake value transfer.
 * Links: src/shared/env/server.ts, src/features/ledger/ledger.facade.ts
 * @public
 */

import { isHex } from "viem";

import {
  DrizzleLedgerStore,
  getDb,
  PinoEventPublisher,
  SystemClock,
  ViemValueTransferAdapter,
} from "@/adapters/server";
import { getTestValueTransfer, InMemoryLedgerStore } from "@/adapters/test";
import {
  type AccessPolicy,
  createAccessPolicy,
  createDonationLedger,
  type DonationLedger,
} from "@/features/ledger/public";
import type {
  Clock,
  EventPublisher,
  LedgerStore,
  ValueTransferPort,
} from "@/ports";
import {
  accessPolicyConfigFromEnv,
  type ServerEnv,
  serverEnv,
} from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  clock: Clock;
  store: LedgerStore;
  transfers: ValueTransferPort;
  events: EventPublisher;
  access: AccessPolicy;
  ledger: DonationLedger;
}

let _container: Container | null = null;

/** Lazily initializes on first access */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/** For tests only - allows fresh container between test runs */
export function resetContainer(): void {
  _container = null;
}

function createStore(env: ServerEnv): LedgerStore {
  if (env.isTestMode) return new InMemoryLedgerStore();
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL is required when APP_ENV=production");
  }
  return new DrizzleLedgerStore(getDb(env.DATABASE_URL));
}

function createTransfers(env: ServerEnv, log: Logger): ValueTransferPort {
  if (env.isTestMode) return getTestValueTransfer();
  const key = env.OPERATOR_PRIVATE_KEY;
  if (!env.EVM_RPC_URL || !key || !isHex(key)) {
    throw new Error(
      "EVM_RPC_URL and OPERATOR_PRIVATE_KEY are required when APP_ENV=production"
    );
  }
  return new ViemValueTransferAdapter({
    rpcUrl: env.EVM_RPC_URL,
    chainId: env.CHAIN_ID,
    operatorPrivateKey: key,
    log,
  });
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({
    service: env.SERVICE_NAME,
    chainId: env.CHAIN_ID,
    level: env.PINO_LOG_LEVEL,
  });

  const access = createAccessPolicy(accessPolicyConfigFromEnv(env));
  const clock = new SystemClock();
  const store = createStore(env);
  const transfers = createTransfers(env, log);
  const events = new PinoEventPublisher(log);

  // Startup log - no URLs/secrets
  log.info(
    {
      env: env.APP_ENV,
      chainId: env.CHAIN_ID,
      accessPolicy: access.kind,
      logLevel: env.PINO_LOG_LEVEL,
    },
    "container initialized"
  );

  const ledger = createDonationLedger({
    store,
    transfers,
    clock,
    access,
    events,
    log,
  });

  return { log, clock, store, transfers, events, access, ledger };
}

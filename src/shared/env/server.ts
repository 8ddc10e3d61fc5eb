// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for server runtime; provides lazy server environment access. Does not build adapters.
 * Invariants: All required env vars validated on first access; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV selects adapter wiring; production requires a database and an operator wallet.
 *        DATABASE_URL may be given directly or built from component vars.
 * Links: src/bootstrap/container.ts, src/shared/env/access-policy.ts
 * @public
 */

import { ZodError, z } from "zod";

import { buildDatabaseUrl } from "@/shared/db";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const addressList = z
  .string()
  .default("")
  .transform((raw) =>
    raw
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
  );

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("charity-ledger"),

  // Database connection: either provide DATABASE_URL directly OR component pieces
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_USER: z.string().min(1).optional(),
  POSTGRES_PASSWORD: z.string().min(1).optional(),
  POSTGRES_DB: z.string().min(1).optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().default(5432),

  // Chain + operator wallet (value transfers)
  EVM_RPC_URL: z.string().url().optional(),
  CHAIN_ID: z.coerce.number().int().positive().default(11155111),
  OPERATOR_PRIVATE_KEY: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/)
    .optional(),

  // Access policy (fixed at construction)
  LEDGER_ACCESS_POLICY: z
    .enum(["single_owner", "multisig", "role_based"])
    .default("single_owner"),
  LEDGER_OWNER_ADDRESS: z.string().optional(),
  LEDGER_MULTISIG_SIGNERS: addressList,
  LEDGER_MULTISIG_THRESHOLD: z.coerce.number().int().positive().optional(),
  LEDGER_VERIFIER_ADDRESSES: addressList,
  LEDGER_TOKEN_ADMIN_ADDRESSES: addressList,
  LEDGER_TREASURY_ADDRESSES: addressList,

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "silent"])
    .default("info"),
});

type ParsedServerEnv = z.infer<typeof serverSchema>;

type ServerEnv = Omit<ParsedServerEnv, "DATABASE_URL"> & {
  /** Null only in APP_ENV=test, where the in-memory store is wired */
  DATABASE_URL: string | null;
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

function resolveDatabaseUrl(parsed: ParsedServerEnv): string | null {
  if (parsed.DATABASE_URL) return parsed.DATABASE_URL;
  if (
    parsed.POSTGRES_USER &&
    parsed.POSTGRES_PASSWORD &&
    parsed.POSTGRES_DB &&
    parsed.DB_HOST
  ) {
    return buildDatabaseUrl({
      POSTGRES_USER: parsed.POSTGRES_USER,
      POSTGRES_PASSWORD: parsed.POSTGRES_PASSWORD,
      POSTGRES_DB: parsed.POSTGRES_DB,
      DB_HOST: parsed.DB_HOST,
      DB_PORT: parsed.DB_PORT,
    });
  }
  return null;
}

/** Production wiring needs a database, an RPC endpoint and an operator key */
function productionMissing(
  parsed: ParsedServerEnv,
  databaseUrl: string | null
): string[] {
  if (parsed.APP_ENV !== "production") return [];
  const missing: string[] = [];
  if (!databaseUrl) missing.push("DATABASE_URL");
  if (!parsed.EVM_RPC_URL) missing.push("EVM_RPC_URL");
  if (!parsed.OPERATOR_PRIVATE_KEY) missing.push("OPERATOR_PRIVATE_KEY");
  return missing;
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      const DATABASE_URL = resolveDatabaseUrl(parsed);

      const missing = productionMissing(parsed, DATABASE_URL);
      if (missing.length > 0) {
        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing,
          invalid: [],
        });
      }

      ENV = {
        ...parsed,
        DATABASE_URL,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // Treat all invalid_type as missing (avoids any casting)
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/** Drops the cached env so the next serverEnv() re-reads process.env */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };

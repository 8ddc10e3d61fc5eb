// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration.
 * Scope: Re-exports validated server env and the access-policy mapping. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: process.env
 * @public
 */

export { accessPolicyConfigFromEnv } from "./access-policy";
export type { EnvValidationMeta, ServerEnv } from "./server";
export { EnvValidationError, resetServerEnv, serverEnv } from "./server";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest configuration for the unit suite (no database, no RPC node).
 * Scope: Test discovery, setup file and path aliases. Does not start infrastructure.
 * Invariants: Coverage disabled by default; tests never leave the process.
 * Side-effects: none
 * Notes: Uses vite-tsconfig-paths so `@/` and `@tests/` resolve the same way tsc does.
 * @public
 */

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/unit/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage",
      include: ["src/**"],
    },
  },
  plugins: [tsconfigPaths()],
});

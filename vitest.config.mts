// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest runner configuration for every workspace's unit tests.
 * Scope: Discovers package-local and service-local tests. Does not start servers or reach the network.
 * Invariants: Node environment; explicit imports from "vitest" (globals off); no coverage by default.
 * Side-effects: none
 * Links: packages/&lt;pkg&gt;/tests, services/&lt;svc&gt;/tests, tests/_fakes
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist", "**/dist/**", "tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/tsup.config`
 * Purpose: Build configuration for the ring-engine service.
 * Scope: Defines tsup bundler settings for the deployable service. Does not contain runtime code.
 * Invariants: ESM format only; workspace packages are bundled since they export TypeScript sources.
 * Side-effects: none
 * Links: services/ring-engine/package.json
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: [/^@concentric\//],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/tsup.config`
 * Purpose: Build configuration for the scenario replay service.
 * Scope: Defines tsup bundler settings for the runnable service. Does not contain runtime code.
 * Invariants: ESM format only; workspace packages are bundled since they ship TypeScript sources.
 * Side-effects: none
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  noExternal: [/^@dualpool\//],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/tsup.config`
 * Purpose: Build configuration for token-ledger package.
 * Scope: Build tooling only. Does not contain runtime code.
 * Invariants: Output must be ESM.
 * Side-effects: IO
 * @internal
 */

import { defineConfig } from "tsup";

export const tsupConfig = defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false, // tsc --noEmit at the root type-checks; tsup handles JS only
  clean: true,
  sourcemap: true,
  platform: "neutral",
});

export default tsupConfig;

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/tsup.config`
 * Purpose: Build configuration for the oic-target CLI.
 * Scope: Defines tsup bundler settings for the executable. Does not contain runtime code.
 * Invariants: ESM only; workspace packages are inlined, npm dependencies stay external.
 * Side-effects: none
 * Links: services/oic-target/src/main.ts
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: { main: "services/oic-target/src/main.ts" },
  outDir: "dist",
  format: ["esm"],
  bundle: true,
  noExternal: [/^@oic-target\//],
  external: ["pino", "zod"],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});

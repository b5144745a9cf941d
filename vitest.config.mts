// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace package (no infrastructure required).
 * Scope: Unit and pipeline tests only; HTTP is stubbed, nothing listens on a port.
 * Invariants: Coverage disabled by default; v8 provider for Node.js compatibility.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Links: tests/setup.ts
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/index.ts", "**/*.config.*"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  resolve: {
    alias: {
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
});

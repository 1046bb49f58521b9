import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

function pkgEntry(dir: string): string {
  return fileURLToPath(new URL(`./packages/${dir}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@tea40/interface": pkgEntry("tea40-ts"),
      "@tea40/crypto": pkgEntry("tea40-crypto"),
      "@tea40/decoder": pkgEntry("tea40-decoder"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packagesDir = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts", "apps/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: [
      {
        find: /^@mydiff\/(utils|utils-node|diff)\/(files|hash|hex|streams)$/,
        replacement: `${packagesDir}/$1/src/$2/index.ts`,
      },
      {
        find: /^@mydiff\/(utils|utils-node|diff)$/,
        replacement: `${packagesDir}/$1/src/index.ts`,
      },
    ],
  },
});

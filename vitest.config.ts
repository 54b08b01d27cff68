import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/rules/src/**/*.ts"],
      exclude: [
        "packages/*/src/**/*.test.ts",
        "packages/*/src/**/index.ts", // barrel re-exports
        "packages/rules/src/types/definition.ts", // type-only
        "packages/rules/src/cli/bin.ts", // entry-point shim
        "**/dist/**",
      ],
    },
  },
});

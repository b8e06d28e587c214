import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      provider: "istanbul",
      reporter: ["text", "text-summary", "lcov"],
      include: ["src/**/*.ts"],
    },
    include: ["test/**/*.spec.ts"],
    // Verbose mode reads PROPDAG_* from the environment; keep test runs quiet.
    env: {
      PROPDAG_VERBOSE: "0",
    },
  },
});

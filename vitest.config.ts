import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // The reporter logs diagnostics to the console; keep test output quiet.
    // Tests that check what is printed capture it through their own CliIO.
    silent: true,
    include: ["src/test/ts/**/*.test.ts"],
  },
});

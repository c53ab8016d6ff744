import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    // Child processes, not worker threads: the CLI acceptance test calls process.chdir.
    pool: "forks",
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});

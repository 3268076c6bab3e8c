import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    // Loading the HiGHS WebAssembly module can take a moment on a cold start.
    testTimeout: 20000,
  },
});

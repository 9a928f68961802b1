import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Full self-play games run a depth-2 search every ply.
    testTimeout: 60_000,
  },
});

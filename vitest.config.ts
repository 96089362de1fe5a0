import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    pool: "forks",
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      // driver.ts (PlaywrightDriver), cli.ts and daemon.ts need a real browser
      // or a spawned process and are left out.
      include: [
        "src/parser.ts",
        "src/registry.ts",
        "src/tab-queue.ts",
        "src/dispatcher.ts",
        "src/commands/*.ts",
        "src/protocol.ts",
        "src/errors.ts",
        "src/shared.ts",
        "src/config.ts",
        "src/stats.ts",
        "src/server.ts",
        "src/client.ts",
        "src/lifecycle.ts",
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
    },
  },
});

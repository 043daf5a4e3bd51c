import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/src/**/__tests__/**/*.test.ts", "packages/*/src/**/__tests__/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});

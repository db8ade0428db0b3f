import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["climate-service/test/**/*.test.ts"],
    restoreMocks: true,
    unstubGlobals: true
  }
});

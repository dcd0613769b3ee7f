import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["rename-media/src/**/*.test.ts"],
    environment: "node",
  },
});

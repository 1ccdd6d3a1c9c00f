import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["viewer/**/*.test.ts"],
    environment: "node",
  },
});

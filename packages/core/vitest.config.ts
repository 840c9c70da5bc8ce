import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenloom/core",
    globals: true,
    environment: "node",
  },
});

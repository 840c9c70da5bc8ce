import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenloom/dispatch",
    globals: true,
    environment: "node",
  },
});

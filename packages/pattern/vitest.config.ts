import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenloom/pattern",
    globals: true,
    environment: "node",
  },
});

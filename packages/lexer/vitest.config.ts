import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenloom/lexer",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "tokenloom",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@enumkit/core",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@enumkit/transformer",
    globals: true,
    environment: "node",
  },
});

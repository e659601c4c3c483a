import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@enumkit/enum",
    globals: true,
    environment: "node",
  },
});

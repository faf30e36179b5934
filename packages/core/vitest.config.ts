import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parsnip/core",
    globals: true,
    environment: "node",
  },
});

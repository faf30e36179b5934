import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parsnip/json",
    globals: true,
    environment: "node",
  },
});

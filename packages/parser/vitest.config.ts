import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parsnip/parser",
    globals: true,
    environment: "node",
  },
});

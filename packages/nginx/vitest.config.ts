import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parsnip/nginx",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@optio/core",
    globals: true,
    environment: "node",
  },
});

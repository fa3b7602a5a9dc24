import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@optio/option",
    globals: true,
    environment: "node",
  },
});

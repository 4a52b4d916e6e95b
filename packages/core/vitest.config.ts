import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sluice/core",
    globals: true,
    environment: "node",
  },
});

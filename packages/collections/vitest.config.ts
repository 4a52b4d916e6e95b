import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sluice/collections",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sluice/std",
    globals: true,
    environment: "node",
  },
});

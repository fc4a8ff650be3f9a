import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@equasets/core",
    globals: true,
    environment: "node",
  },
});

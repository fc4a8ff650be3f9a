import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@equasets/collections",
    globals: true,
    environment: "node",
  },
});

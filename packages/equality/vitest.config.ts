import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@equasets/equality",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rangeline/core",
    globals: true,
    environment: "node",
  },
});

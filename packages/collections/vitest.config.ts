import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rangeline/collections",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rangeline/stream",
    globals: true,
    environment: "node",
  },
});

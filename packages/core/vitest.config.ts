import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@variantkit/core",
    include: ["tests/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@variantkit/variant",
    include: ["src/__tests__/**/*.test.ts"],
  },
});

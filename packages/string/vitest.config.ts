import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@variantkit/string",
    include: ["src/__tests__/**/*.test.ts"],
  },
});

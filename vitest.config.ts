// Vitest configuration for mailvault.
// Tests live beside the sources they cover.

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
  },
});

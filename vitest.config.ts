import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@_lib": fileURLToPath(new URL("./_lib", import.meta.url)),
    },
  },
  test: {
    include: ["_lib/**/*.test.ts", "src/**/*.test.ts"],
    environment: "node",
  },
});

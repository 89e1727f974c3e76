// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import { fileURLToPath } from "node:url";

export default defineConfig({
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@shared": fileURLToPath(
        new URL("./backend/services/shared/src", import.meta.url)
      ),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/**/test/**/*.spec.ts",
      "frontend/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/shared/test/setup.ts"],
    testTimeout: 20_000,
  },
});

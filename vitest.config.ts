// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/shared/test/**/*.spec.ts",
      "backend/services/museum/test/**/*.spec.ts",
      "frontend/museum/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/museum/test/setup.ts"],
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});

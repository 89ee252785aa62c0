import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@lib": path.resolve(__dirname, "./lib"),
    },
  },
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    env: {
      NODE_ENV: "test",
    },
    typecheck: {
      enabled: true,
      include: ["lib/**/*.test-d.ts"],
    },
    include: ["lib/**/*.test.ts", "lib/**/*.test.tsx"],
  },
});

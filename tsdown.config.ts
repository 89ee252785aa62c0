import { defineConfig, type UserConfig } from "tsdown";

export default defineConfig(() => {
  const minify = process.env.MINIFY === "true";

  const testEntries = [
    "!lib/**/*.test.ts",
    "!lib/**/*.test.tsx",
    "!lib/**/*.test-d.ts",
  ];

  const entriesSet = new Set(testEntries);

  if (minify) {
    entriesSet.add("lib/index.ts");
  } else {
    entriesSet.add("lib/**/*.{ts,tsx}");
  }

  return {
    entry: [...entriesSet],
    outDir: "dist",
    clean: true,
    target: "node20",
    platform: "node",
    unbundle: !minify,
    dts: true,
    external: ["react", "react-dom", "zod", "pino"],
    inputOptions: {
      checks: {
        circularDependency: true,
      },
    },
    minify,
  } satisfies UserConfig;
});

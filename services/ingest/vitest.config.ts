import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "ingest",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["lcov", "text"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/__tests__/**",
        "src/**/*.test.ts",
        "src/index.ts",
        "src/**/types.ts",
        "src/chunking/index.ts",
        "src/pipeline/index.ts",
        "src/qdrant/index.ts",
        "src/embeddings/index.ts",
      ],
      reportsDirectory: "./coverage",
    },
  },
});

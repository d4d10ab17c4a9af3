import { defineConfig, defineProject } from "vitest/config";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: "collab-core",
          include: ["packages/collab-core/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
    ],
  },
});

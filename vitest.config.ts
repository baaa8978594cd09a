import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./platform/core/types/vitest.config.ts", "./platform/core/types"],
  ["./platform/core/dyn/vitest.config.ts", "./platform/core/dyn"],
  ["./platform/core/config/vitest.config.ts", "./platform/core/config"],
  ["./platform/runtime/io/vitest.config.ts", "./platform/runtime/io"],
  ["./platform/runtime/mutators/vitest.config.ts", "./platform/runtime/mutators"],
] as const;

export default defineConfig({
  test: {
    projects: workspaceProjects.map(([configPath, root]) => ({
      root,
      extends: configPath,
    })),
  },
});

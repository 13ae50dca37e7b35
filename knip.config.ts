import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/resolver": {
      entry: ["src/index.ts", "src/backend/*/index.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
      ignore: ["**/test-utils.ts"],
    },
  },
};

export default config;

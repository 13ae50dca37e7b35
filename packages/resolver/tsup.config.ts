import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    "backend/sqlite/index": "src/backend/sqlite/index.ts",
    "backend/postgres/index": "src/backend/postgres/index.ts",
  },
  format: ["esm", "cjs"],
  dts: true,
  splitting: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: ["better-sqlite3", "pg"],
});

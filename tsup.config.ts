import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"], // Build only ESM format
  platform: "node",
  target: "node20",
  sourcemap: true,
  clean: true,
});

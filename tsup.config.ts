import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts", "src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  clean: true,
  dts: true,
  sourcemap: true,
  splitting: false,
  shims: false,
  outDir: "dist"
});

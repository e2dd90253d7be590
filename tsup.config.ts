import { defineConfig } from "tsup";

// src/cli.ts carries its own shebang, so no banner here
export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: true,
  clean: true,
  dts: false,
  outDir: "bundle",
});

import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    cli: "src/cli.ts",
    "mcp/cli": "src/mcp/cli.ts",
  },
  format: ["esm"],
  dts: { entry: "src/index.ts" },
  clean: true,
  // Backends are loaded with dynamic import(); keep them as shared chunks.
  splitting: true,
  sourcemap: true,
  target: "node20",
  platform: "node",
});

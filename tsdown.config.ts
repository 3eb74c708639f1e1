import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    bin: "src/bin.ts",
  },
  platform: "node",
  format: "esm",
  fixedExtension: true,
});

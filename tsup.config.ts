import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  clean: true,
  dts: {
    resolve: true,
  },
  format: ["esm"],
  sourcemap: true,
  target: "es2022",
  splitting: false,
  treeshake: true,
  minify: false,
  external: ["@noble/hashes", "@zxcvbn-ts/core", "idb-keyval", "jose"],
});

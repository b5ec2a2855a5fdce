import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: false,
  esbuildOptions(options) {
    // Error messages and debug output name classes by `constructor.name`.
    options.keepNames = true;
  },
});

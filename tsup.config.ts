import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The file pipeline uses node:fs/promises; the codec itself only needs
  // typed arrays, TextEncoder and TextDecoder.
  platform: "node",
  target:   "node20",
});

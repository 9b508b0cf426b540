import { defineConfig } from "tsup";

const shared = {
  // The SDK workspace exports TypeScript sources, so it is bundled in
  noExternal: ["pagehealth"],
  define: {
    __CLI_VERSION__: JSON.stringify(process.env.npm_package_version ?? "0.1.0"),
  },
};

export default defineConfig([
  {
    entry: { index: "src/index.ts" },
    format: ["esm"],
    dts: true,
    clean: true,
    splitting: false,
    sourcemap: true,
    ...shared,
  },
  {
    entry: { bin: "src/bin.ts" },
    format: ["esm"],
    dts: false,
    clean: false,
    splitting: false,
    sourcemap: true,
    banner: {
      js: "#!/usr/bin/env node",
    },
    ...shared,
  },
]);

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/bin/computechain.ts"],
  format: ["esm"],
  dts: { entry: "src/index.ts" },
  clean: true,
  tsconfig: "tsconfig.build.json",
  // Bundle zod and other dependencies so the CLI runs from dist alone
  noExternal: ["zod", "bs58", "minimist"],
  // Externalize tweetnacl - it has dynamic requires that break when bundled into ESM
  external: ["tweetnacl"],
});

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  // The engine package exports TypeScript sources; bundle it into the CLI
  noExternal: ["@reconnoiter/engine"],
});

import { defineConfig, type Options } from "tsdown";

export default defineConfig((options: Options) => ({
  // Spread CLI options first so our config takes precedence
  ...options,

  entry: ["src/server.ts"],
  clean: !options.watch,
  format: ["esm" as const],

  // Generate source maps for better stack traces
  sourcemap: true,

  // Don't bundle dependencies - use them from node_modules, except for @shared
  noExternal: [/^@shared/],
  tsconfig: "../tsconfig.json",

  ignoreWatch: ["**/*.test.ts", "src/test/**/*"],
}));

import { defineConfig, type Options } from "tsup";
import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// read tsconfig paths
const tsconfig = JSON.parse(readFileSync(resolve("tsconfig.json"), "utf8"));

const paths: Record<string, string[]> = tsconfig.compilerOptions?.paths ?? {};
const baseUrl: string = tsconfig.compilerOptions?.baseUrl ?? ".";
const projectRoot = dirname(fileURLToPath(import.meta.url));
const baseDir = resolve(projectRoot, baseUrl);

const esbuildOptions: Options["esbuildOptions"] = (options) => {
  options.alias = { ...(options.alias ?? {}) };
  for (const [key, values] of Object.entries(paths)) {
    const target = values[0];
    if (!target) continue;
    options.alias[key.replace("/*", "")] = resolve(baseDir, target.replace("/*", ""));
  }
};

export default defineConfig([
  {
    entry: { "cli/index": "src/cli/index.ts" },
    format: ["esm"],
    outDir: "dist",
    target: "node20",
    banner: { js: "#!/usr/bin/env node" },
    esbuildOptions,
  },
  {
    entry: { index: "src/index.ts" },
    format: ["esm"],
    dts: true,
    outDir: "dist",
    target: "node20",
    esbuildOptions,
  },
]);

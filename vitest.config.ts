import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Mirror tsconfig `paths` so @cli/* and @core/* resolve the same way under Vitest.
function aliasesFromTsconfig(): Record<string, string> {
  const tsconfig = JSON.parse(readFileSync(resolve(__dirname, "tsconfig.json"), "utf8"));
  const baseUrl: string = tsconfig.compilerOptions?.baseUrl ?? ".";
  const paths: Record<string, string[]> = tsconfig.compilerOptions?.paths ?? {};
  const alias: Record<string, string> = {};
  for (const [key, values] of Object.entries(paths)) {
    const target = values[0]?.replace(/\/\*$/, "");
    if (target) {
      alias[key.replace(/\/\*$/, "")] = resolve(__dirname, baseUrl, target);
    }
  }
  return alias;
}

export default defineConfig({
  resolve: {
    alias: aliasesFromTsconfig(),
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
    restoreMocks: true,
  },
});

import fs from "fs";
import path from "path";
import { logInfo, logWarn } from "@cli/utils/logger";

export const SAMPLE_CONFIG = `import { defineConfig } from "tandem";

export default defineConfig({
  name: "my-app",
  siteRoot: "target/site",
  pkgDir: "pkg",
  siteAddr: "127.0.0.1:3000",
  ui: {
    roots: ["src", "app/src"],
    compile: {
      command: "cargo",
      args: ["build", "--lib", "--target", "wasm32-unknown-unknown", "--features", "hydrate"],
    },
    artifact: "target/wasm32-unknown-unknown/{profile}/my_app.wasm",
    bind: {
      command: "wasm-bindgen",
      args: ["{input}", "--target", "web", "--no-typescript", "--out-dir", "{out}", "--out-name", "{name}"],
    },
  },
  server: {
    roots: ["src", "server/src"],
    compile: { command: "cargo", args: ["build", "--bin", "my-app", "--features", "ssr"] },
    artifact: "target/{profile}/my-app",
  },
  style: { file: "style/main.css" },
  assets: { dir: "public" },
  reload: { port: 3001 },
  test: {
    server: { command: "cargo", args: ["test", "--features", "ssr"] },
    ui: { command: "wasm-pack", args: ["test", "--headless", "--firefox"] },
    e2e: { command: "npx", args: ["playwright", "test"], cwd: "end2end" },
  },
});
`;

export interface ConfigCommandOptions {
  rootDir: string;
  /** Write `tandem.config.ts` instead of printing it. */
  write?: boolean;
}

/** Prints a starter config, or writes it when none exists yet. Returns the written path, if any. */
export function runConfigCommand(options: ConfigCommandOptions): string | null {
  if (!options.write) {
    process.stdout.write(SAMPLE_CONFIG);
    return null;
  }
  const target = path.resolve(options.rootDir, "tandem.config.ts");
  if (fs.existsSync(target)) {
    logWarn(`${path.relative(options.rootDir, target)} already exists; leaving it untouched`);
    return null;
  }
  fs.writeFileSync(target, SAMPLE_CONFIG, "utf8");
  logInfo(`Wrote ${path.relative(options.rootDir, target)}`);
  return target;
}

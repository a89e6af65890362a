import fs from "fs";
import os from "os";
import path from "path";
import type { ResolvedCommand, ResolvedConfig } from "../src/core/types/config";
import type { TandemTestConfig } from "../src/types/config";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `tandem-${prefix}-`));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, contents: string, mode?: number) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, contents, "utf8");
  if (mode !== undefined) fs.chmodSync(filePath, mode);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function shell(script: string, cwd: string): ResolvedCommand {
  return { command: "sh", args: ["-c", script], env: {}, cwd };
}

/** A fully populated config rooted at `root`; commands are never run unless a test asks for it. */
export function makeConfig(root: string, overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return {
    rootDir: root,
    name: "app",
    release: false,
    profile: "debug",
    siteRoot: path.join(root, "target", "site"),
    pkgDir: "pkg",
    workDir: path.join(root, ".tandem"),
    siteAddr: "127.0.0.1:3000",
    ui: {
      roots: [path.join(root, "src")],
      extensions: [".rs"],
      compile: shell("true", root),
      artifact: "out/{name}.wasm",
      bind: shell("true", root),
    },
    server: {
      roots: [path.join(root, "src")],
      extensions: [".rs"],
      compile: shell("true", root),
      artifact: "out/{name}",
      args: [],
      env: {},
    },
    style: { file: path.join(root, "style", "main.css"), command: null },
    assets: { dir: path.join(root, "public") },
    watch: { debounceMs: 100, polling: false, ignore: [] },
    reload: { host: "127.0.0.1", port: 3001, sendTimeoutMs: 1000 },
    test: { server: null, ui: null, e2e: null },
    stopGraceMs: 5000,
    ...overrides,
  };
}

export interface ProjectOptions {
  serverCompile?: string;
  /** Body of the server executable, after the shebang. */
  serverScript?: string;
  /** `test` section of the config. */
  test?: TandemTestConfig;
}

/** A project whose compilers and binder are shell one-liners over fixture files. */
export function writeProject(dir: string, options: ProjectOptions = {}) {
  const serverCompile = options.serverCompile ?? "mkdir -p out && cp fixtures/server.sh out/app";
  writeFile(path.join(dir, "fixtures", "app.wasm"), "wasm-bytes");
  writeFile(path.join(dir, "fixtures", "app.js"), "export default function init() {}\n");
  writeFile(path.join(dir, "fixtures", "server.sh"), `#!/bin/sh\n${options.serverScript ?? "exec sleep 30"}\n`, 0o755);
  writeFile(path.join(dir, "src", "main.rs"), "fn main() {}\n");
  writeFile(path.join(dir, "style", "main.css"), "body { color: red; }\n");
  writeFile(path.join(dir, "public", "index.html"), "<html><body></body></html>\n");
  writeFile(
    path.join(dir, "tandem.config.js"),
    `export default {
  name: "app",
  ui: {
    compile: { command: "sh", args: ["-c", "mkdir -p out && cp fixtures/app.wasm out/app.wasm"] },
    artifact: "out/{name}.wasm",
    bind: {
      command: "sh",
      args: ["-c", 'cp "$0" "$1/app_bg.wasm" && cp fixtures/app.js "$1/app.js"', "{input}", "{out}"],
    },
  },
  server: {
    compile: { command: "sh", args: ["-c", ${JSON.stringify(serverCompile)}] },
    artifact: "out/{name}",
  },
  style: { file: "style/main.css" },
  assets: { dir: "public" },
  watch: { polling: true, debounceMs: 50 },
  reload: { port: 0 },
  stopGraceMs: 1000,${options.test ? `\n  test: ${JSON.stringify(options.test)},` : ""}
};
`,
  );
}

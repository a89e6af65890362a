import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WatchSetupError } from "../src/core/errors";
import { classifyChange, isIgnoredPath, ProjectWatcher, watchRoots, type ClassifierRules } from "../src/core/watcher";
import { makeTempDir, removeDir } from "./helpers";

let root: string;
let rules: ClassifierRules;

beforeEach(() => {
  root = makeTempDir("watcher");
  rules = {
    assetsDir: path.join(root, "public"),
    styleFile: path.join(root, "style", "main.scss"),
    ui: { roots: [path.join(root, "src"), path.join(root, "app")], extensions: [".rs"] },
    server: { roots: [path.join(root, "src"), path.join(root, "server")], extensions: [".rs"] },
  };
});

afterEach(() => {
  removeDir(root);
});

describe("classifyChange", () => {
  it("puts everything under the asset dir in the asset category", () => {
    expect(classifyChange(path.join(root, "public", "site.css"), rules)).toEqual(["asset"]);
    expect(classifyChange(path.join(root, "public", "img"), rules, "addDir")).toEqual(["asset"]);
  });

  it("recognizes stylesheets by file or extension", () => {
    expect(classifyChange(path.join(root, "style", "main.scss"), rules)).toEqual(["style"]);
    expect(classifyChange(path.join(root, "src", "widgets.css"), rules)).toEqual(["style"]);
  });

  it("classifies code by root, shared roots yielding both", () => {
    expect(classifyChange(path.join(root, "src", "lib.rs"), rules)).toEqual(["ui", "server"]);
    expect(classifyChange(path.join(root, "app", "page.rs"), rules)).toEqual(["ui"]);
    expect(classifyChange(path.join(root, "server", "main.rs"), rules)).toEqual(["server"]);
  });

  it("ignores other files and directory events outside assets", () => {
    expect(classifyChange(path.join(root, "src", "notes.md"), rules)).toEqual([]);
    expect(classifyChange(path.join(root, "app", "nested"), rules, "addDir")).toEqual([]);
  });
});

describe("watch roots and ignores", () => {
  it("collects roots without duplicates", () => {
    expect(watchRoots(rules)).toEqual([
      path.join(root, "src"),
      path.join(root, "app"),
      path.join(root, "server"),
      path.join(root, "style"),
      path.join(root, "public"),
    ]);
  });

  it("ignores build outputs and generated directories", () => {
    const options = { rootDir: root, outputDirs: [path.join(root, "target", "site")], ignore: [path.join(root, "src", "gen")] };
    expect(isIgnoredPath(path.join(root, "target", "site", "pkg", "app.js"), options)).toBe(true);
    expect(isIgnoredPath(path.join(root, "node_modules", "x", "index.js"), options)).toBe(true);
    expect(isIgnoredPath(path.join(root, "src", "gen", "out.rs"), options)).toBe(true);
    expect(isIgnoredPath(path.join(root, "src", "lib.rs"), options)).toBe(false);
  });
});

describe("ProjectWatcher", () => {
  it("fails with WatchSetupError when a root is missing", async () => {
    const watcher = new ProjectWatcher({ rootDir: root, rules, outputDirs: [] });
    const subscription = watcher.subscribe([path.join(root, "missing")]);
    await expect(subscription.next()).rejects.toBeInstanceOf(WatchSetupError);
  });

  it("emits classified events and stops when the consumer returns", async () => {
    fs.mkdirSync(path.join(root, "style"), { recursive: true });
    const watcher = new ProjectWatcher({ rootDir: root, rules, outputDirs: [], polling: true, pollInterval: 50 });
    const subscription = watcher.subscribe([path.join(root, "style")]);
    const sheet = path.join(root, "style", "extra.css");

    const pending = subscription.next();
    // Keep touching the file until the watcher, which becomes ready asynchronously, reports it.
    const timer = setInterval(() => fs.writeFileSync(sheet, `a { order: ${Date.now()}; }`), 100);
    try {
      const result = await pending;
      expect(result.done).toBe(false);
      expect(result.value).toMatchObject({ path: sheet, category: "style" });
    } finally {
      clearInterval(timer);
    }

    await subscription.return?.();
    expect(await subscription.next()).toEqual({ value: undefined, done: true });
  });
});

import fs from "fs";
import path from "path";
import chokidar, { type FSWatcher } from "chokidar";
import { logDebug, logInfo, logTrace } from "@cli/utils/logger";
import { Channel } from "@core/channel";
import { WatchSetupError, describeError } from "@core/errors";
import type { Category, ChangeEvent, ChangeKind } from "@core/types/build";
import { isWithin, removeNested } from "@core/utils/paths";

export const STYLE_EXTENSIONS = [".css", ".scss", ".sass", ".less"];

const GENERATED_SEGMENTS = new Set(["node_modules", ".git", "target"]);

export interface SourceRoots {
  roots: readonly string[];
  extensions: readonly string[];
}

/** Absolute-path rules deciding which category a changed path belongs to. */
export interface ClassifierRules {
  assetsDir?: string;
  styleFile?: string;
  ui?: SourceRoots;
  server?: SourceRoots;
}

export interface WatcherOptions {
  rootDir: string;
  rules: ClassifierRules;
  /** Build outputs; never watched. */
  outputDirs: readonly string[];
  ignore?: readonly string[];
  polling?: boolean;
  pollInterval?: number;
}

/**
 * Categories a changed path belongs to. Empty means the change is irrelevant.
 * A code file under both UI and server roots belongs to both.
 */
export function classifyChange(filePath: string, rules: ClassifierRules, kind: ChangeKind = "change"): Category[] {
  const abs = path.resolve(filePath);
  if (rules.assetsDir && isWithin(rules.assetsDir, abs)) return ["asset"];
  if (kind === "addDir" || kind === "unlinkDir") return [];

  const ext = path.extname(abs).toLowerCase();
  if ((rules.styleFile && path.resolve(rules.styleFile) === abs) || STYLE_EXTENSIONS.includes(ext)) {
    return ["style"];
  }

  const categories: Category[] = [];
  const inSources = (sources: SourceRoots | undefined) =>
    !!sources && sources.extensions.includes(ext) && sources.roots.some((root) => isWithin(root, abs));
  if (inSources(rules.ui)) categories.push("ui");
  if (inSources(rules.server)) categories.push("server");
  return categories;
}

/** Every directory the rules need watched, nested ones collapsed. */
export function watchRoots(rules: ClassifierRules): string[] {
  const roots: string[] = [...(rules.ui?.roots ?? []), ...(rules.server?.roots ?? [])];
  if (rules.styleFile) roots.push(path.dirname(rules.styleFile));
  if (rules.assetsDir) roots.push(rules.assetsDir);
  return removeNested(roots);
}

export function isIgnoredPath(filePath: string, options: Pick<WatcherOptions, "rootDir" | "outputDirs" | "ignore">): boolean {
  const abs = path.resolve(filePath);
  if (options.outputDirs.some((dir) => isWithin(dir, abs))) return true;
  if (options.ignore?.some((dir) => isWithin(dir, abs))) return true;
  const relative = path.relative(options.rootDir, abs);
  if (relative.startsWith("..")) return false;
  return relative.split(path.sep).some((segment) => GENERATED_SEGMENTS.has(segment));
}

type WatchSignal =
  | { kind: "event"; event: ChangeEvent }
  | { kind: "error"; error: WatchSetupError };

/**
 * One live subscription. The OS watch is established on the first `next()` and released
 * when the consumer stops iterating. A fresh `subscribe()` starts a new watch.
 */
class WatchSubscription implements AsyncIterableIterator<ChangeEvent> {
  private queue = new Channel<WatchSignal>();
  private watcher: FSWatcher | null = null;
  private starting: Promise<void> | null = null;
  private disposed = false;

  constructor(
    private readonly roots: readonly string[],
    private readonly options: WatcherOptions,
  ) {}

  async next(): Promise<IteratorResult<ChangeEvent, undefined>> {
    if (!this.starting) this.starting = this.start();
    await this.starting;
    const item = await this.queue.receive();
    if (item.done) return { value: undefined, done: true };
    if (item.value.kind === "error") {
      await this.dispose();
      throw item.value.error;
    }
    return { value: item.value.event, done: false };
  }

  async return(): Promise<IteratorResult<ChangeEvent, undefined>> {
    await this.dispose();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ChangeEvent> {
    return this;
  }

  private async start(): Promise<void> {
    if (this.roots.length === 0) {
      throw new WatchSetupError("No directories to watch");
    }
    for (const root of this.roots) {
      let stat: fs.Stats;
      try {
        stat = await fs.promises.stat(root);
      } catch (err) {
        throw new WatchSetupError(`Cannot watch ${root}: ${describeError(err)}`, root);
      }
      if (!stat.isDirectory()) {
        throw new WatchSetupError(`Cannot watch ${root}: not a directory`, root);
      }
    }

    if (this.disposed) return;
    const watcher = chokidar.watch([...this.roots], {
      persistent: true,
      ignoreInitial: true,
      ignored: (candidate: string) => isIgnoredPath(candidate, this.options),
      usePolling: this.options.polling ?? false,
      interval: this.options.pollInterval ?? 100,
    });
    this.watcher = watcher;

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => reject(err);
        watcher.once("error", onError);
        watcher.once("ready", () => {
          watcher.off("error", onError);
          resolve();
        });
      });
    } catch (err) {
      await this.dispose();
      throw new WatchSetupError(`File watcher could not start: ${describeError(err)}`);
    }

    watcher.on("all", (eventName, filePath) => this.handle(eventName, filePath));
    watcher.on("error", (err) => {
      this.queue.send({ kind: "error", error: new WatchSetupError(`File watcher failed: ${describeError(err)}`) });
    });
    logInfo(`Watching folders ${this.roots.map((root) => path.relative(this.options.rootDir, root) || ".").join(", ")}`);
  }

  private handle(kind: ChangeKind, filePath: string) {
    const abs = path.resolve(filePath);
    if (!this.roots.some((root) => isWithin(root, abs))) return;
    const categories = classifyChange(abs, this.options.rules, kind);
    if (!categories.length) {
      logTrace(`Watcher ignored ${kind} ${abs}`);
      return;
    }
    const timestamp = Date.now();
    for (const category of categories) {
      logDebug(`Watcher ${category} ${kind}: ${path.relative(this.options.rootDir, abs)}`);
      this.queue.send({ kind: "event", event: { path: abs, category, kind, timestamp } });
    }
  }

  private async dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.queue.close();
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }
}

export class ProjectWatcher {
  constructor(private readonly options: WatcherOptions) {}

  get roots(): string[] {
    return watchRoots(this.options.rules);
  }

  /** Lazy, infinite sequence of change events under `roots`; each call is an independent subscription. */
  subscribe(roots: readonly string[] = this.roots): AsyncIterableIterator<ChangeEvent> {
    return new WatchSubscription(removeNested(roots), this.options);
  }
}

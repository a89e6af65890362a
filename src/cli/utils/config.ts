import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { build, type Plugin } from "esbuild";
import { z } from "zod";
import type { TandemCommand, TandemConfig } from "../../types/config";
import { ConfigError, describeError } from "@core/errors";
import type { ResolvedCommand, ResolvedConfig, ResolvedSources } from "@core/types/config";
import { DEFAULT_DEBOUNCE_MS } from "@core/debouncer";
import { DEFAULT_SEND_TIMEOUT_MS } from "@core/reload";
import { DEFAULT_STOP_GRACE_MS } from "@core/supervisor";
import { loadEnv } from "./env";
import { logDebug, logInfo } from "./logger";

export const CONFIG_BASENAMES = [
  "tandem.config.ts",
  "tandem.config.mts",
  "tandem.config.js",
  "tandem.config.mjs",
  "tandem.config.cjs",
];

export const DEFAULTS = {
  siteRoot: "target/site",
  pkgDir: "pkg",
  workDir: ".tandem",
  siteAddr: "127.0.0.1:3000",
  reloadPort: 3001,
  sourceRoots: ["src"],
  extensions: [".rs"],
} as const;

const commandSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
    cwd: z.string().optional(),
  })
  .strict();

const sourcesShape = {
  roots: z.array(z.string().min(1)).nonempty().optional(),
  extensions: z.array(z.string().min(1)).nonempty().optional(),
};

const configSchema = z
  .object({
    name: z.string().regex(/^[\w.-]+$/, "must be a plain file name").optional(),
    siteRoot: z.string().min(1).optional(),
    pkgDir: z.string().min(1).optional(),
    workDir: z.string().min(1).optional(),
    siteAddr: z.string().regex(/^[^\s:]+:\d+$/, "must be host:port").optional(),
    release: z.boolean().optional(),
    ui: z
      .object({ ...sourcesShape, compile: commandSchema, artifact: z.string().min(1), bind: commandSchema })
      .strict()
      .optional(),
    server: z
      .object({
        ...sourcesShape,
        compile: commandSchema,
        artifact: z.string().min(1),
        args: z.array(z.string()).optional(),
        env: z.record(z.string()).optional(),
      })
      .strict()
      .optional(),
    style: z.object({ file: z.string().min(1), command: commandSchema.optional() }).strict().optional(),
    assets: z.object({ dir: z.string().min(1) }).strict().optional(),
    watch: z
      .object({
        debounceMs: z.number().int().nonnegative().optional(),
        polling: z.boolean().optional(),
        ignore: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    reload: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        sendTimeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    test: z
      .object({ server: commandSchema.optional(), ui: commandSchema.optional(), e2e: commandSchema.optional() })
      .strict()
      .optional(),
    stopGraceMs: z.number().int().nonnegative().optional(),
  })
  .strict() satisfies z.ZodType<TandemConfig>;

const configFactory = z
  .function()
  .args(z.object({ mode: z.string(), command: z.string() }))
  .returns(z.unknown());

export interface ConfigEnv {
  mode: string;
  command: string;
}

let cachedConfig: { file: string; config: TandemConfig } | null = null;

// Bundle the config file into a single ESM string that can be `import()`ed.
async function bundleConfig(entry: string) {
  const absDir = path.dirname(entry);

  // `import { defineConfig } from "tandem"` must work without the package installed next to the config.
  const inlineTandemPlugin: Plugin = {
    name: "inline-tandem",
    setup(build) {
      build.onResolve({ filter: /^tandem$/ }, () => ({
        path: "tandem-virtual",
        namespace: "tandem-ns",
      }));
      build.onLoad({ filter: /.*/, namespace: "tandem-ns" }, () => ({
        contents: `export function defineConfig(config) { return config; }`,
        loader: "js",
      }));
    },
  };

  const result = await build({
    entryPoints: [entry],
    bundle: true,
    platform: "node",
    format: "esm",
    sourcemap: "inline",
    write: false,
    target: "node20",
    logLevel: "silent",
    absWorkingDir: absDir,
    plugins: [inlineTandemPlugin],
  });
  const output = result.outputFiles[0];
  if (!output) throw new Error("Failed to bundle tandem config");

  let contents = output.text;
  if (contents.includes("import.meta.url")) {
    contents = contents.replace(/import\.meta\.url/g, "__TANDEM_IMPORT_META_URL");
    contents = `const __TANDEM_IMPORT_META_URL = ${JSON.stringify(pathToFileURL(entry).href)};\n${contents}`;
  }
  const preamble =
    `const __dirname = ${JSON.stringify(absDir)};\n` +
    `const __filename = ${JSON.stringify(entry)};\n`;
  return preamble + contents;
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_BASENAMES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

function exportedValue(mod: unknown): unknown {
  if (mod && typeof mod === "object") {
    if ("default" in mod) return mod.default;
    if ("config" in mod) return mod.config;
  }
  return mod;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Validates a user config object; a function export is called with the config env first. */
export async function parseTandemConfig(value: unknown, env: ConfigEnv): Promise<TandemConfig> {
  let resolved = value;
  if (typeof resolved === "function") {
    resolved = await configFactory.parse(resolved)(env);
  }
  const parsed = configSchema.safeParse(resolved);
  if (!parsed.success) {
    throw new ConfigError("Invalid tandem config", formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Loads and validates `tandem.config.*` from `cwd`. Cached until `resetTandemConfigCache()`. */
export async function loadTandemConfig(cwd: string, env: ConfigEnv): Promise<TandemConfig> {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    throw new ConfigError(`No config file found in ${cwd}`, CONFIG_BASENAMES.map((name) => `looked for ${name}`));
  }
  if (cachedConfig?.file === configPath) return cachedConfig.config;

  let imported: unknown;
  try {
    const bundled = await bundleConfig(configPath);
    const dataUrl = `data:text/javascript;base64,${Buffer.from(bundled).toString("base64")}`;
    imported = await import(dataUrl);
  } catch (err) {
    throw new ConfigError(`Failed to load ${path.relative(cwd, configPath)}: ${describeError(err)}`);
  }

  const config = await parseTandemConfig(exportedValue(imported), env);
  cachedConfig = { file: configPath, config };
  logInfo(`Loaded tandem config from ${path.relative(cwd, configPath)}`);
  return config;
}

export function resetTandemConfigCache() {
  cachedConfig = null;
}

function resolveCommand(rootDir: string, cmd: TandemCommand): ResolvedCommand {
  return {
    command: cmd.command,
    args: cmd.args ?? [],
    env: cmd.env ?? {},
    cwd: path.resolve(rootDir, cmd.cwd ?? "."),
  };
}

function resolveSources(rootDir: string, roots?: string[], extensions?: string[]): ResolvedSources {
  return {
    roots: (roots ?? [...DEFAULTS.sourceRoots]).map((root) => path.resolve(rootDir, root)),
    extensions: (extensions ?? [...DEFAULTS.extensions]).map((ext) => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase()),
  };
}

function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${source} must be a port number, got "${value}"`);
  }
  return port;
}

export interface ResolveOptions {
  rootDir: string;
  /** CLI `--release`; wins over the config file. */
  release?: boolean;
  env?: NodeJS.ProcessEnv;
}

/** Applies defaults and the `TANDEM_*` environment overlay, and makes every path absolute. */
export function resolveConfig(config: TandemConfig, options: ResolveOptions): ResolvedConfig {
  const rootDir = path.resolve(options.rootDir);
  const env = options.env ?? process.env;
  const release = options.release ?? config.release ?? false;

  const rawPkgDir = env.TANDEM_SITE_PKG_DIR ?? config.pkgDir ?? DEFAULTS.pkgDir;
  const pkgDir = rawPkgDir.replace(/[\\/]+$/, "");
  const segments = pkgDir.split(/[\\/]/);
  // Mirrored on every UI build; must name a subdirectory of the site root.
  if (path.isAbsolute(rawPkgDir) || segments.some((segment) => segment === "" || segment === "." || segment === "..")) {
    throw new ConfigError(`pkgDir must be a relative path inside the site root, got "${rawPkgDir}"`);
  }
  const siteAddr = env.TANDEM_SITE_ADDR ?? config.siteAddr ?? DEFAULTS.siteAddr;
  const siteHost = siteAddr.slice(0, siteAddr.lastIndexOf(":")) || "127.0.0.1";
  const reloadPort = env.TANDEM_RELOAD_PORT
    ? parsePort(env.TANDEM_RELOAD_PORT, "TANDEM_RELOAD_PORT")
    : config.reload?.port ?? DEFAULTS.reloadPort;

  const resolved: ResolvedConfig = {
    rootDir,
    name: env.TANDEM_OUTPUT_NAME ?? config.name ?? path.basename(rootDir),
    release,
    profile: release ? "release" : "debug",
    siteRoot: path.resolve(rootDir, env.TANDEM_SITE_ROOT ?? config.siteRoot ?? DEFAULTS.siteRoot),
    pkgDir,
    workDir: path.resolve(rootDir, config.workDir ?? DEFAULTS.workDir),
    siteAddr,
    ui: config.ui
      ? {
          ...resolveSources(rootDir, config.ui.roots, config.ui.extensions),
          compile: resolveCommand(rootDir, config.ui.compile),
          artifact: config.ui.artifact,
          bind: resolveCommand(rootDir, config.ui.bind),
        }
      : null,
    server: config.server
      ? {
          ...resolveSources(rootDir, config.server.roots, config.server.extensions),
          compile: resolveCommand(rootDir, config.server.compile),
          artifact: config.server.artifact,
          args: config.server.args ?? [],
          env: config.server.env ?? {},
        }
      : null,
    style: config.style
      ? {
          file: path.resolve(rootDir, config.style.file),
          command: config.style.command ? resolveCommand(rootDir, config.style.command) : null,
        }
      : null,
    assets: config.assets ? { dir: path.resolve(rootDir, config.assets.dir) } : null,
    watch: {
      debounceMs: config.watch?.debounceMs ?? DEFAULT_DEBOUNCE_MS,
      polling: config.watch?.polling ?? false,
      ignore: (config.watch?.ignore ?? []).map((entry) => path.resolve(rootDir, entry)),
    },
    reload: {
      host: config.reload?.host ?? siteHost,
      port: reloadPort,
      sendTimeoutMs: config.reload?.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS,
    },
    test: {
      server: config.test?.server ? resolveCommand(rootDir, config.test.server) : null,
      ui: config.test?.ui ? resolveCommand(rootDir, config.test.ui) : null,
      e2e: config.test?.e2e ? resolveCommand(rootDir, config.test.e2e) : null,
    },
    stopGraceMs: config.stopGraceMs ?? DEFAULT_STOP_GRACE_MS,
  };
  logDebug(`Resolved config: ${resolved.name} (${resolved.profile}), site ${resolved.siteRoot}`);
  return resolved;
}

export interface ProjectOptions {
  rootDir: string;
  release?: boolean;
  command: string;
}

/** `.env` files, then the config file, then defaults and overlays. */
export async function loadProjectConfig(options: ProjectOptions): Promise<ResolvedConfig> {
  const rootDir = path.resolve(options.rootDir);
  const mode = options.release ? "production" : "development";
  loadEnv(mode, rootDir);
  const config = await loadTandemConfig(rootDir, { mode, command: options.command });
  return resolveConfig(config, { rootDir, release: options.release });
}

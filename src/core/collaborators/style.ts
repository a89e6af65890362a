import fs from "fs";
import path from "path";
import postcss, { AcceptedPlugin, ProcessOptions } from "postcss";
import postcssLoadConfig from "postcss-load-config";
import { logDebug } from "@cli/utils/logger";
import { describeError } from "@core/errors";
import type { ResolvedConfig } from "@core/types/config";
import type { Collaborator } from "./types";
import { describeFailure, runCommand } from "./command";
import { basePlaceholders } from "./compile";

interface PostcssSetup {
  plugins: AcceptedPlugin[];
  options: ProcessOptions;
}

const configCache = new Map<string, Promise<PostcssSetup>>();

async function loadPostcssSetup(rootDir: string): Promise<PostcssSetup> {
  try {
    const result = await postcssLoadConfig({}, rootDir);
    logDebug(`Using PostCSS config ${path.relative(rootDir, result.file)}`);
    return { plugins: [...result.plugins], options: result.options };
  } catch (err) {
    if (describeError(err).startsWith("No PostCSS Config found")) {
      return { plugins: [], options: {} };
    }
    throw err;
  }
}

/** Looked up once per project; a config edit needs a restart of the watch session. */
export function getPostcssSetup(rootDir: string): Promise<PostcssSetup> {
  let setup = configCache.get(rootDir);
  if (!setup) {
    setup = loadPostcssSetup(rootDir).catch((err: unknown) => {
      configCache.delete(rootDir);
      throw err;
    });
    configCache.set(rootDir, setup);
  }
  return setup;
}

export function resetPostcssCache() {
  configCache.clear();
}

export async function processStylesheet(file: string, rootDir: string, to: string): Promise<string> {
  const { plugins, options } = await getPostcssSetup(rootDir);
  const code = await fs.promises.readFile(file, "utf8");
  // Parsed up front: without plugins, process() never parses and lets syntax errors through.
  const root = postcss.parse(code, { from: file });
  const result = await postcss(plugins).process(root, { ...options, from: file, to, map: false });
  return result.css;
}

/** Writes `<name>.css` into the staging dir, through the configured command or PostCSS. */
export function createStyleProcessor(config: ResolvedConfig): Collaborator | null {
  const style = config.style;
  if (!style) return null;
  return async (request) => {
    const target = path.join(request.stagingDir, `${config.name}.css`);
    if (style.command) {
      const result = await runCommand(style.command, {
        signal: request.signal,
        placeholders: { ...basePlaceholders(config), input: style.file, out: request.stagingDir },
        label: "[style]",
      });
      if (result.aborted) return { ok: false, diagnostic: "canceled" };
      if (result.code !== 0) return { ok: false, diagnostic: describeFailure(style.command, result) };
      if (!fs.existsSync(target)) {
        return { ok: false, diagnostic: `style command did not write ${path.basename(target)}` };
      }
      return { ok: true };
    }

    try {
      const css = await processStylesheet(style.file, config.rootDir, target);
      await fs.promises.writeFile(target, css);
      return { ok: true };
    } catch (err) {
      return { ok: false, diagnostic: describeError(err) };
    }
  };
}

import { logError, logInfo, logSuccess } from "@cli/utils/logger";
import { loadProjectConfig } from "@cli/utils/config";
import { basePlaceholders } from "@core/collaborators/compile";
import { describeFailure, runCommand } from "@core/collaborators/command";
import { ConfigError } from "@core/errors";
import type { ResolvedCommand, ResolvedConfig } from "@core/types/config";

export interface TestCommandOptions {
  rootDir: string;
  release?: boolean;
}

/** Runs one configured suite with its output shown. Resolves true when it exits with 0. */
export async function runSuite(config: ResolvedConfig, name: string, cmd: ResolvedCommand): Promise<boolean> {
  logInfo(`Running ${name} tests`);
  const started = Date.now();
  const result = await runCommand(cmd, { placeholders: basePlaceholders(config), label: `[${name}]`, show: true });
  if (result.code !== 0) {
    logError(`${name} tests failed: ${describeFailure(cmd, result)}`);
    return false;
  }
  logSuccess(`${name} tests passed in ${Date.now() - started}ms`);
  return true;
}

/** Server unit tests, then UI unit tests. Stops at the first failing suite. */
export async function runTestCommand(options: TestCommandOptions): Promise<boolean> {
  const config = await loadProjectConfig({ ...options, command: "test" });
  const suites: [string, ResolvedCommand][] = [];
  if (config.test.server) suites.push(["server", config.test.server]);
  if (config.test.ui) suites.push(["ui", config.test.ui]);
  if (!suites.length) {
    throw new ConfigError("test needs `test.server` or `test.ui` in the config");
  }

  for (const [name, cmd] of suites) {
    if (!(await runSuite(config, name, cmd))) return false;
  }
  return true;
}

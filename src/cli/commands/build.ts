/**
{
  "description": "One-shot build. Cleans the site root, runs every configured step once and reports the outcome.",
  "phase": 1
}
*/

import fs from "fs";
import path from "path";
import { logError, logInfo, logSuccess } from "@cli/utils/logger";
import { loadProjectConfig } from "@cli/utils/config";
import { CancellationToken } from "@core/cancellation";
import { ConfigError } from "@core/errors";
import { coldIntent } from "@core/orchestrator";
import { createBuildPipeline } from "@core/pipeline";
import type { BuildOutcome } from "@core/types/build";
import type { ResolvedConfig } from "@core/types/config";
import { isWithin } from "@core/utils/paths";

export interface BuildCommandOptions {
  rootDir: string;
  release?: boolean;
}

/** Removes the previous site before a one-shot build. */
export async function cleanSiteRoot(config: ResolvedConfig) {
  if (isWithin(config.siteRoot, config.rootDir)) {
    throw new ConfigError(`Refusing to clean ${config.siteRoot}: it contains the project root`);
  }
  await fs.promises.rm(config.siteRoot, { recursive: true, force: true });
  logInfo(`Cleaned ${path.relative(config.rootDir, config.siteRoot) || "."}`);
}

export function logOutcome(outcome: BuildOutcome) {
  for (const result of outcome.results) {
    if (result.outcome.kind === "failed") {
      logError(result.outcome.error.message);
    } else if (result.outcome.kind === "skipped") {
      logInfo(`Step ${result.step} skipped (${result.outcome.reason})`);
    }
  }
}

export async function runBuildCommand(options: BuildCommandOptions): Promise<BuildOutcome> {
  const config = await loadProjectConfig({ rootDir: options.rootDir, release: options.release, command: "build" });
  await cleanSiteRoot(config);

  const started = Date.now();
  const pipeline = createBuildPipeline(config);
  const outcome = await pipeline.run(coldIntent(), { attempt: 1, token: new CancellationToken() });
  logOutcome(outcome);
  if (outcome.overall === "succeeded") {
    logSuccess(`Built ${config.name} (${config.profile}) in ${Date.now() - started}ms`);
  } else {
    logError(`Build ${outcome.overall}`);
  }
  return outcome;
}

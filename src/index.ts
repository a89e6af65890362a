export * from "./types/config";
export type { BuildProfile, ResolvedCommand, ResolvedConfig, ResolvedSources } from "./core/types/config";
export type {
  Artifact,
  BuildIntent,
  BuildOutcome,
  BuildResult,
  Category,
  ChangeEvent,
  ReloadDirective,
  StepDefinition,
  StepName,
} from "./core/types/build";
export { loadProjectConfig, resolveConfig } from "./cli/utils/config";
export { BuildPipeline, createBuildPipeline } from "./core/pipeline";
export { createStepTable } from "./core/steps";
export { Orchestrator, coldIntent, watchIntents, type FinalizedReport } from "./core/orchestrator";
export { ProcessSupervisor, serverEnv } from "./core/supervisor";
export { ReloadHub, injectReloadClient, reloadClientScript } from "./core/reload";
export { startReloadServer } from "./core/reload-server";
export { ProjectWatcher, classifyChange } from "./core/watcher";
export * from "./core/errors";

import type { ConfigEnv } from "./cli/utils/config";
import type { TandemConfig } from "./types/config";

export type { ConfigEnv };

export function defineConfig(config: TandemConfig): TandemConfig;
export function defineConfig(
  config: (env: ConfigEnv) => TandemConfig | Promise<TandemConfig>
): (env: ConfigEnv) => TandemConfig | Promise<TandemConfig>;
export function defineConfig(
  config: TandemConfig | ((env: ConfigEnv) => TandemConfig | Promise<TandemConfig>)
): TandemConfig | ((env: ConfigEnv) => TandemConfig | Promise<TandemConfig>) {
  return config;
}

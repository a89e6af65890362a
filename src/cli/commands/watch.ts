/**
{
  "description": "Watch mode. Wires watcher, debouncer, pipeline, supervisor and live reload into one orchestrator and runs it until a signal arrives.",
  "phase": 2
}
*/

import { logError, logInfo } from "@cli/utils/logger";
import { loadProjectConfig } from "@cli/utils/config";
import { Channel } from "@core/channel";
import { coldIntent, Orchestrator, watchIntents, type FinalizedReport } from "@core/orchestrator";
import { createBuildPipeline } from "@core/pipeline";
import { ReloadHub } from "@core/reload";
import { startReloadServer, type ReloadServer } from "@core/reload-server";
import { serverBinaryPath } from "@core/steps";
import { ProcessSupervisor, serverEnv } from "@core/supervisor";
import type { ResolvedConfig } from "@core/types/config";
import { ProjectWatcher } from "@core/watcher";

export interface WatchCommandOptions {
  rootDir: string;
  release?: boolean;
  enableSignalHandlers?: boolean;
  /** Receives every finalized build. */
  reports?: Channel<FinalizedReport>;
}

export interface WatchHandle {
  orchestrator: Orchestrator;
  reloadPort: number;
  /** Resolves when the session has shut down. */
  done: Promise<void>;
  close: () => Promise<void>;
}

export function createSupervisor(config: ResolvedConfig, watch: boolean): ProcessSupervisor | null {
  if (!config.server) return null;
  return new ProcessSupervisor({
    args: config.server.args,
    env: serverEnv(config, watch),
    cwd: config.rootDir,
    stopGraceMs: config.stopGraceMs,
  });
}

export function createWatcher(config: ResolvedConfig): ProjectWatcher {
  return new ProjectWatcher({
    rootDir: config.rootDir,
    rules: {
      assetsDir: config.assets?.dir,
      styleFile: config.style?.file,
      ui: config.ui ?? undefined,
      server: config.server ?? undefined,
    },
    outputDirs: [config.siteRoot, config.workDir],
    ignore: config.watch.ignore,
    polling: config.watch.polling,
  });
}

type SignalHandler = { event: NodeJS.Signals; handler: () => void };

export function installSignalHandlers(shutdown: () => Promise<void>): () => void {
  const handlers: SignalHandler[] = [];
  const onSignal = () => {
    shutdown().catch((err) => logError("Shutdown error:", err));
  };
  for (const event of ["SIGINT", "SIGTERM"] as const) {
    process.on(event, onSignal);
    handlers.push({ event, handler: onSignal });
  }
  return () => {
    for (const { event, handler } of handlers) process.off(event, handler);
  };
}

export async function startWatch(options: WatchCommandOptions): Promise<WatchHandle> {
  const config = await loadProjectConfig({ rootDir: options.rootDir, release: options.release, command: "watch" });
  const hub = new ReloadHub({ sendTimeoutMs: config.reload.sendTimeoutMs });
  const reloadServer: ReloadServer = await startReloadServer(hub, {
    host: config.reload.host,
    port: config.reload.port,
  });

  const orchestrator = new Orchestrator({
    pipeline: createBuildPipeline(config),
    siteRoot: config.siteRoot,
    supervisor: createSupervisor(config, true),
    serverBinary: config.server ? serverBinaryPath(config) : null,
    hub,
    reports: options.reports,
  });

  orchestrator.submit(coldIntent());
  const done = orchestrator.run(watchIntents(createWatcher(config), config.watch.debounceMs));

  let closing: Promise<void> | null = null;
  let removeSignalHandlers = () => {};
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        removeSignalHandlers();
        logInfo("Stopping...");
        await orchestrator.stop();
        hub.close();
        await reloadServer.close();
      })();
    }
    return closing;
  };

  if (options.enableSignalHandlers ?? true) {
    removeSignalHandlers = installSignalHandlers(close);
  }

  return { orchestrator, reloadPort: reloadServer.port, done, close };
}

import { logError, logInfo } from "@cli/utils/logger";
import { loadProjectConfig } from "@cli/utils/config";
import { Channel } from "@core/channel";
import { ConfigError } from "@core/errors";
import { coldIntent, Orchestrator, type FinalizedReport } from "@core/orchestrator";
import { createBuildPipeline } from "@core/pipeline";
import { serverBinaryPath } from "@core/steps";
import type { ResolvedConfig } from "@core/types/config";
import { createSupervisor, installSignalHandlers } from "./watch";

export interface ServeCommandOptions {
  rootDir: string;
  release?: boolean;
}

export interface ServingSession {
  config: ResolvedConfig;
  orchestrator: Orchestrator;
  /** Resolves once the orchestrator has shut down. */
  done: Promise<void>;
}

/** Cold build, then a running server. Null when the build fails or the server does not come up. */
export async function buildAndServe(options: ServeCommandOptions & { command: string }): Promise<ServingSession | null> {
  const config = await loadProjectConfig(options);
  const supervisor = createSupervisor(config, false);
  if (!supervisor) {
    throw new ConfigError(`${options.command} needs a \`server\` section in the config`);
  }

  const reports = new Channel<FinalizedReport>();
  const orchestrator = new Orchestrator({
    pipeline: createBuildPipeline(config),
    siteRoot: config.siteRoot,
    supervisor,
    serverBinary: serverBinaryPath(config),
    reports,
    stopOnServerExit: true,
  });
  orchestrator.submit(coldIntent());
  const done = orchestrator.run();

  const first = await reports.receive();
  if (first.done || first.value.outcome.overall !== "succeeded" || supervisor.state !== "running") {
    logError("Initial build failed; not serving");
    await orchestrator.stop();
    return null;
  }
  return { config, orchestrator, done };
}

/**
 * Builds everything once, then keeps the server running until Ctrl-C.
 * Resolves false when the build fails or the server exits on its own.
 */
export async function runServeCommand(options: ServeCommandOptions): Promise<boolean> {
  const session = await buildAndServe({ ...options, command: "serve" });
  if (!session) return false;

  logInfo(`Serving on http://${session.config.siteAddr} (Ctrl-C to stop)`);
  const removeSignalHandlers = installSignalHandlers(() => session.orchestrator.stop());
  await session.done;
  removeSignalHandlers();
  return session.orchestrator.serverExit === null;
}

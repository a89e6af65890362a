import { logError } from "@cli/utils/logger";
import { loadProjectConfig } from "@cli/utils/config";
import { ConfigError } from "@core/errors";
import { buildAndServe } from "./serve";
import { runSuite } from "./test";

export interface EndToEndCommandOptions {
  rootDir: string;
  release?: boolean;
}

/**
 * Builds everything, starts the server, runs the end-to-end suite against it
 * and stops the server again, whatever the suite's outcome.
 */
export async function runEndToEndCommand(options: EndToEndCommandOptions): Promise<boolean> {
  const config = await loadProjectConfig({ ...options, command: "end-to-end" });
  const e2e = config.test.e2e;
  if (!e2e) {
    throw new ConfigError("end-to-end needs `test.e2e` in the config");
  }

  const session = await buildAndServe({ ...options, command: "end-to-end" });
  if (!session) return false;

  let passed = false;
  try {
    passed = await runSuite(config, "e2e", { ...e2e, env: { TANDEM_SITE_ADDR: config.siteAddr, ...e2e.env } });
  } finally {
    await session.orchestrator.stop();
  }
  if (passed && session.orchestrator.serverExit) {
    logError("Server exited while the end-to-end suite was running");
    return false;
  }
  return passed;
}

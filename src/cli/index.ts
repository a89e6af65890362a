import path from "path";
import { Command } from "commander";
import { logError, setLogVerbosity, getLogVerbosity } from "@cli/utils/logger";
import { runBuildCommand } from "@cli/commands/build";
import { runConfigCommand } from "@cli/commands/config";
import { runEndToEndCommand } from "@cli/commands/end-to-end";
import { runServeCommand } from "@cli/commands/serve";
import { runTestCommand } from "@cli/commands/test";
import { startWatch } from "@cli/commands/watch";

interface GlobalOptions {
  project: string;
  verbose: number;
}

const program = new Command();

program
  .name("tandem")
  .description("Watch, build, supervise and live-reload WebAssembly UI + native server projects")
  .version("0.1.0")
  .option("--project <dir>", "Project root", process.cwd())
  .option("-v, --verbose", "More output; repeat for trace output", (_value: string, previous: number) => previous + 1, 0)
  .hook("preAction", () => {
    const { verbose } = program.opts<GlobalOptions>();
    setLogVerbosity(Math.max(verbose, getLogVerbosity()));
  });

function rootDir(): string {
  return path.resolve(program.opts<GlobalOptions>().project);
}

program
  .command("build")
  .description("Clean the site root and build everything once")
  .option("--release", "Build with the release profile")
  .action(async (options: { release?: boolean }) => {
    try {
      const outcome = await runBuildCommand({ rootDir: rootDir(), release: options.release });
      if (outcome.overall !== "succeeded") process.exitCode = 1;
    } catch (err) {
      logError("Build failed", err);
      process.exit(1);
    }
  });

program
  .command("serve")
  .description("Build everything, then run the server until interrupted")
  .option("--release", "Build with the release profile")
  .action(async (options: { release?: boolean }) => {
    try {
      const served = await runServeCommand({ rootDir: rootDir(), release: options.release });
      if (!served) process.exitCode = 1;
    } catch (err) {
      logError("Serve failed", err);
      process.exit(1);
    }
  });

program
  .command("test")
  .description("Run the server and UI unit tests")
  .option("--release", "Test with the release profile")
  .action(async (options: { release?: boolean }) => {
    try {
      const passed = await runTestCommand({ rootDir: rootDir(), release: options.release });
      if (!passed) process.exitCode = 1;
    } catch (err) {
      logError("Test failed", err);
      process.exit(1);
    }
  });

program
  .command("end-to-end")
  .description("Build, start the server and run the end-to-end suite against it")
  .option("--release", "Build with the release profile")
  .action(async (options: { release?: boolean }) => {
    try {
      const passed = await runEndToEndCommand({ rootDir: rootDir(), release: options.release });
      if (!passed) process.exitCode = 1;
    } catch (err) {
      logError("End-to-end run failed", err);
      process.exit(1);
    }
  });

program
  .command("watch")
  .description("Rebuild on change, restart the server and reload connected browsers")
  .option("--release", "Build with the release profile")
  .action(async (options: { release?: boolean }) => {
    try {
      const handle = await startWatch({ rootDir: rootDir(), release: options.release });
      await handle.done;
    } catch (err) {
      logError("Watch failed", err);
      process.exit(1);
    }
  });

program
  .command("config")
  .description("Print a starter tandem.config.ts")
  .option("--write", "Write it to the project root instead")
  .action((options: { write?: boolean }) => {
    runConfigCommand({ rootDir: rootDir(), write: options.write });
  });

program.parseAsync(process.argv).catch((err) => {
  logError("Unexpected error", err);
  process.exit(1);
});

import { spawn } from "child_process";
import { logDebug, logInfo } from "@cli/utils/logger";
import type { ResolvedCommand } from "@core/types/config";
import { expandPlaceholders } from "@core/utils/paths";

export interface RunCommandOptions {
  signal?: AbortSignal;
  placeholders?: Readonly<Record<string, string>>;
  /** Prefix of forwarded output lines. */
  label?: string;
  /** Forward output at info level instead of debug. */
  show?: boolean;
}

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** stdout and stderr interleaved as received. */
  output: string;
  aborted: boolean;
  /** Set when the process could not be spawned at all. */
  spawnError?: Error;
}

function lineForwarder(label: string, show: boolean) {
  const log = show ? logInfo : logDebug;
  let pending = "";
  return {
    push(chunk: string) {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? "";
      for (const line of lines) log(`${label} ${line}`);
    },
    flush() {
      if (pending) log(`${label} ${pending}`);
      pending = "";
    },
  };
}

/** Runs an external tool to completion. Aborting the signal sends SIGTERM to the child. */
export function runCommand(cmd: ResolvedCommand, options: RunCommandOptions = {}): Promise<CommandResult> {
  const placeholders = options.placeholders ?? {};
  const command = expandPlaceholders(cmd.command, placeholders);
  const args = cmd.args.map((arg) => expandPlaceholders(arg, placeholders));
  const label = options.label ?? `[${command}]`;
  const signal = options.signal;

  if (signal?.aborted) {
    return Promise.resolve({ code: null, signal: null, output: "", aborted: true });
  }

  logDebug(`Running ${[command, ...args].join(" ")}`);

  return new Promise((resolve) => {
    let output = "";
    let aborted = false;
    const forward = lineForwarder(label, options.show ?? false);

    const child = spawn(command, args, {
      cwd: cmd.cwd,
      env: { ...process.env, ...cmd.env },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const onAbort = () => {
      aborted = true;
      child.kill("SIGTERM");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const collect = (data: Buffer) => {
      const chunk = data.toString();
      output += chunk;
      forward.push(chunk);
    };
    child.stdout.on("data", collect);
    child.stderr.on("data", collect);

    child.on("error", (err) => {
      signal?.removeEventListener("abort", onAbort);
      resolve({ code: null, signal: null, output, aborted, spawnError: err });
    });

    child.on("close", (code, exitSignal) => {
      signal?.removeEventListener("abort", onAbort);
      forward.flush();
      resolve({ code, signal: exitSignal, output, aborted });
    });
  });
}

/** Diagnostic text for a command that did not succeed. */
export function describeFailure(cmd: ResolvedCommand, result: CommandResult): string {
  if (result.spawnError) return `could not run ${cmd.command}: ${result.spawnError.message}`;
  const status = result.signal ? `signal ${result.signal}` : `exit code ${result.code}`;
  const tail = result.output.trim().split(/\r?\n/).slice(-20).join("\n");
  return tail ? `${cmd.command} failed with ${status}\n${tail}` : `${cmd.command} failed with ${status}`;
}

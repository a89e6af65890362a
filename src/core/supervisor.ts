import fs from "fs";
import { spawn, type ChildProcess, type StdioOptions } from "child_process";
import { logDebug, logInfo, logWarn } from "@cli/utils/logger";
import { Channel } from "@core/channel";
import { LaunchError, ProcessCrash, describeError } from "@core/errors";
import type { ResolvedConfig } from "@core/types/config";

export type ProcessState = "running" | "stopped";

export interface ServerProcessHandle {
  readonly pid: number;
  readonly binaryPath: string;
  readonly binaryHash: string | undefined;
  readonly state: ProcessState;
}

/** Emitted when the server exits without being asked to. */
export interface ProcessExit {
  pid: number;
  binaryPath: string;
  code: number | null;
  signal: NodeJS.Signals | null;
  error: ProcessCrash;
}

export interface SupervisorOptions {
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  stopGraceMs?: number;
  stdio?: StdioOptions;
}

/** What the orchestrator needs from a supervisor. */
export interface ServerControl {
  readonly state: ProcessState;
  readonly exits: Channel<ProcessExit>;
  start(binary: string, hash?: string): Promise<ServerProcessHandle>;
  stop(): Promise<void>;
  restartIfChanged(binary: string, hash?: string): Promise<boolean>;
}

interface Running {
  child: ChildProcess;
  handle: ServerProcessHandle;
  exited: Promise<void>;
  stopping: boolean;
}

export const DEFAULT_STOP_GRACE_MS = 5000;

/** Environment the server reads to find the site it serves. */
export function serverEnv(config: ResolvedConfig, watch: boolean): Record<string, string> {
  const env: Record<string, string> = {
    TANDEM_OUTPUT_NAME: config.name,
    TANDEM_SITE_ROOT: config.siteRoot,
    TANDEM_SITE_PKG_DIR: config.pkgDir,
    TANDEM_SITE_ADDR: config.siteAddr,
    TANDEM_RELOAD_PORT: String(config.reload.port),
    ...config.server?.env,
  };
  if (watch) env.TANDEM_WATCH = "ON";
  return env;
}

/**
 * Owns at most one server process. Calls are queued; a restart never overlaps
 * a start or a stop.
 */
export class ProcessSupervisor implements ServerControl {
  readonly exits = new Channel<ProcessExit>();
  private current: Running | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: SupervisorOptions = {}) {}

  get state(): ProcessState {
    return this.current ? "running" : "stopped";
  }

  get handle(): ServerProcessHandle | null {
    return this.current?.handle ?? null;
  }

  start(binary: string, hash?: string): Promise<ServerProcessHandle> {
    return this.serialize(() => this.launch(binary, hash));
  }

  stop(): Promise<void> {
    return this.serialize(() => this.terminate());
  }

  restartIfChanged(binary: string, hash?: string): Promise<boolean> {
    return this.serialize(async () => {
      const running = this.current?.handle;
      if (running && hash !== undefined && running.binaryHash === hash && running.binaryPath === binary) {
        logDebug(`Server binary unchanged (${hash.slice(0, 8)}); not restarting`);
        return false;
      }
      await this.terminate();
      await this.launch(binary, hash);
      return true;
    });
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const next = this.queue.then(operation, operation);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async launch(binary: string, hash: string | undefined): Promise<ServerProcessHandle> {
    if (this.current) {
      throw new LaunchError(`Server already running (pid ${this.current.handle.pid})`, binary);
    }
    try {
      await fs.promises.access(binary, fs.constants.X_OK);
    } catch (err) {
      throw new LaunchError(`Server binary ${binary} is missing or not executable: ${describeError(err)}`, binary);
    }

    const child = spawn(binary, this.options.args ?? [], {
      cwd: this.options.cwd,
      env: { ...process.env, ...this.options.env },
      stdio: this.options.stdio ?? "inherit",
    });

    const pid = await new Promise<number>((resolve, reject) => {
      child.once("spawn", () => {
        if (child.pid === undefined) {
          reject(new LaunchError(`Server ${binary} started without a pid`, binary));
        } else {
          resolve(child.pid);
        }
      });
      child.once("error", (err) => reject(new LaunchError(`Could not start ${binary}: ${err.message}`, binary)));
    });

    const handle: ServerProcessHandle = { pid, binaryPath: binary, binaryHash: hash, state: "running" };
    const running: Running = {
      child,
      handle,
      stopping: false,
      exited: new Promise((resolve) => {
        child.once("exit", (code, signal) => {
          if (this.current === running) this.current = null;
          if (!running.stopping) {
            const error = new ProcessCrash(pid, code, signal);
            logWarn(error.message);
            this.exits.send({ pid, binaryPath: binary, code, signal, error });
          }
          resolve();
        });
      }),
    };
    this.current = running;
    logInfo(`Server started (pid ${pid})`);
    return handle;
  }

  private async terminate(): Promise<void> {
    const running = this.current;
    if (!running) return;
    running.stopping = true;
    const { child, handle } = running;
    if (child.exitCode === null && child.signalCode === null) {
      child.kill("SIGTERM");
      const grace = this.options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
      let timer: NodeJS.Timeout | undefined;
      const timedOut = await Promise.race([
        running.exited.then(() => false),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(true), grace);
        }),
      ]);
      clearTimeout(timer);
      if (timedOut) {
        logWarn(`Server ${handle.pid} ignored SIGTERM for ${grace}ms; sending SIGKILL`);
        child.kill("SIGKILL");
      }
      await running.exited;
    }
    if (this.current === running) this.current = null;
    logDebug(`Server ${handle.pid} stopped`);
  }
}

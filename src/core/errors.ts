export class TandemError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "TandemError";
  }
}

export const ErrorCodes = {
  WATCH_SETUP: "WATCH_SETUP",
  STEP_FAILED: "STEP_FAILED",
  LAUNCH_FAILED: "LAUNCH_FAILED",
  PROCESS_CRASHED: "PROCESS_CRASHED",
  BROADCAST_FAILED: "BROADCAST_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
} as const;

/** The OS watch could not be established. Fatal to watch mode only. */
export class WatchSetupError extends TandemError {
  constructor(message: string, public readonly root?: string) {
    super(message, ErrorCodes.WATCH_SETUP);
    this.name = "WatchSetupError";
  }
}

/** A build step's collaborator reported a failure or threw. */
export class StepError extends TandemError {
  constructor(
    public readonly step: string,
    public readonly diagnostic: string,
  ) {
    super(`Step "${step}" failed: ${diagnostic}`, ErrorCodes.STEP_FAILED);
    this.name = "StepError";
  }
}

export class LaunchError extends TandemError {
  constructor(message: string, public readonly binary: string) {
    super(message, ErrorCodes.LAUNCH_FAILED);
    this.name = "LaunchError";
  }
}

export class ProcessCrash extends TandemError {
  constructor(
    public readonly pid: number,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
  ) {
    super(
      `Server process ${pid} exited unexpectedly (${signal ? `signal ${signal}` : `code ${exitCode}`})`,
      ErrorCodes.PROCESS_CRASHED,
    );
    this.name = "ProcessCrash";
  }
}

export class BroadcastError extends TandemError {
  constructor(message: string, public readonly sessionId: string) {
    super(message, ErrorCodes.BROADCAST_FAILED);
    this.name = "BroadcastError";
  }
}

export class ConfigError extends TandemError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length ? `${message}\n  - ${issues.join("\n  - ")}` : message, ErrorCodes.CONFIG_INVALID);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** `code` of a Node system error (ENOENT, EXDEV, ...), if there is one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

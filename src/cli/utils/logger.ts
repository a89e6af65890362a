import chalk from "chalk";

let verbosity = verbosityFromEnv(process.env.TANDEM_LOG);

function verbosityFromEnv(value: string | undefined): number {
  if (value === "trace") return 2;
  if (value === "debug") return 1;
  return 0;
}

/** 0: info/warn/error, 1: + debug, 2: + trace. */
export function setLogVerbosity(level: number) {
  verbosity = Math.max(0, Math.floor(level));
}

export function getLogVerbosity(): number {
  return verbosity;
}

export function logInfo(message: string) {
  console.log(chalk.cyan(`[Tandem] ${message}`));
}

export function logSuccess(message: string) {
  console.log(chalk.green(`[Tandem] ${message}`));
}

export function logWarn(message: string) {
  console.warn(chalk.yellow(`[Tandem] ${message}`));
}

export function logError(message: string, err?: unknown) {
  console.error(chalk.red(`[Tandem] ${message}`));
  if (err) console.error(err);
}

export function logDebug(message: string) {
  if (verbosity < 1) return;
  console.log(chalk.gray(`[Tandem] ${message}`));
}

export function logTrace(message: string) {
  if (verbosity < 2) return;
  console.log(chalk.dim(`[Tandem] ${message}`));
}

import fs from "fs";
import path from "path";
import type { ResolvedCommand, ResolvedConfig } from "@core/types/config";
import { expandPlaceholders } from "@core/utils/paths";
import type { Collaborator, CollaboratorReport, CollaboratorRequest } from "./types";
import { describeFailure, runCommand } from "./command";

export function basePlaceholders(config: ResolvedConfig): Record<string, string> {
  return { name: config.name, profile: config.profile };
}

interface CompileOptions {
  compile: ResolvedCommand;
  /** Where the compiler leaves its product; may contain placeholders. */
  artifact: string;
  label: string;
  executable?: boolean;
}

async function compileAndCollect(
  config: ResolvedConfig,
  options: CompileOptions,
  request: CollaboratorRequest,
): Promise<CollaboratorReport> {
  const placeholders = { ...basePlaceholders(config), out: request.stagingDir };
  const result = await runCommand(options.compile, {
    signal: request.signal,
    placeholders,
    label: options.label,
  });
  if (result.aborted) return { ok: false, diagnostic: "canceled" };
  if (result.code !== 0) return { ok: false, diagnostic: describeFailure(options.compile, result) };

  const artifact = path.resolve(config.rootDir, expandPlaceholders(options.artifact, placeholders));
  if (!fs.existsSync(artifact)) {
    return { ok: false, diagnostic: `compiler finished but ${artifact} does not exist` };
  }
  const staged = path.join(request.stagingDir, path.basename(request.step.output));
  await fs.promises.copyFile(artifact, staged);
  if (options.executable) await fs.promises.chmod(staged, 0o755);
  return { ok: true };
}

/** Compiles the UI crate to a raw bytecode module. */
export function createUiCompiler(config: ResolvedConfig): Collaborator | null {
  const ui = config.ui;
  if (!ui) return null;
  return (request) =>
    compileAndCollect(config, { compile: ui.compile, artifact: ui.artifact, label: "[ui]" }, request);
}

export function createServerCompiler(config: ResolvedConfig): Collaborator | null {
  const server = config.server;
  if (!server) return null;
  return (request) =>
    compileAndCollect(
      config,
      { compile: server.compile, artifact: server.artifact, label: "[server]", executable: true },
      request,
    );
}

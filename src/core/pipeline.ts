/**
{
  "description": "Build pipeline. Runs the steps an intent selects in dependency order, stages every collaborator product, and commits it only if the attempt is still current.",
  "phase": 1
}
*/

import fs from "fs";
import path from "path";
import { logDebug, logTrace } from "@cli/utils/logger";
import type { CancellationToken } from "@core/cancellation";
import { createCollaborators } from "@core/collaborators";
import type { CollaboratorReport, CollaboratorSet } from "@core/collaborators/types";
import { StepError, describeError, errnoCode } from "@core/errors";
import { hashFile, hashPath, hashTree } from "@core/hasher";
import { createStepTable } from "@core/steps";
import type {
  Artifact,
  BuildIntent,
  BuildOutcome,
  BuildResult,
  OverallOutcome,
  SkipReason,
  StepDefinition,
  StepName,
} from "@core/types/build";
import type { ResolvedConfig } from "@core/types/config";

export interface PipelineOptions {
  steps: readonly StepDefinition[];
  collaborators: CollaboratorSet;
  /** Staging directories live under `<workDir>/staging/<attempt>`. */
  workDir: string;
}

export interface PipelineRunOptions {
  attempt: number;
  token: CancellationToken;
  /** Hash of an artifact in the last finalized successful build. */
  baseline?: (artifactPath: string) => string | undefined;
}

/** The part of the pipeline the orchestrator depends on. */
export interface BuildRunner {
  run(intent: BuildIntent, options: PipelineRunOptions): Promise<BuildOutcome>;
}

/**
 * Per-output single-writer chain. A step of a newer attempt waits here until the same
 * step of a superseded attempt has reached a terminal state.
 */
class OutputLocks {
  private tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}

async function movePath(from: string, to: string) {
  await fs.promises.mkdir(path.dirname(to), { recursive: true });
  const stat = await fs.promises.stat(from);
  if (stat.isDirectory()) {
    await fs.promises.rm(to, { recursive: true, force: true });
  }
  try {
    await fs.promises.rename(from, to);
  } catch (err) {
    if (errnoCode(err) !== "EXDEV") throw err;
    await fs.promises.cp(from, to, { recursive: true, force: true });
    await fs.promises.rm(from, { recursive: true, force: true });
  }
}

async function stagedEntries(stagingDir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(stagingDir);
  return entries.sort();
}

/** Hashes the staged product, then moves it onto the step's output. */
async function commitStaged(step: StepDefinition, stagingDir: string): Promise<Artifact[]> {
  const artifact = (artifactPath: string, hash: string): Artifact => ({
    step: step.name,
    category: step.category,
    path: artifactPath,
    hash,
  });

  switch (step.commit.kind) {
    case "file": {
      const staged = path.join(stagingDir, path.basename(step.output));
      if (!fs.existsSync(staged)) {
        throw new Error(`no output produced (expected ${path.basename(step.output)})`);
      }
      const hash = await hashFile(staged);
      await movePath(staged, step.output);
      return [artifact(step.output, hash)];
    }
    case "merge": {
      const entries = await stagedEntries(stagingDir);
      if (!entries.length) throw new Error("no output produced");
      const artifacts: Artifact[] = [];
      for (const name of entries) {
        const staged = path.join(stagingDir, name);
        const target = path.join(step.output, name);
        artifacts.push(artifact(target, await hashPath(staged)));
        await movePath(staged, target);
      }
      return artifacts;
    }
    case "mirror": {
      const preserve = new Set(step.commit.preserve);
      const hash = await hashTree(stagingDir);
      const entries = (await stagedEntries(stagingDir)).filter((name) => !preserve.has(name));
      await fs.promises.mkdir(step.output, { recursive: true });
      const keep = new Set(entries);
      for (const existing of await fs.promises.readdir(step.output)) {
        if (preserve.has(existing) || keep.has(existing)) continue;
        logTrace(`Removing stale ${path.join(step.output, existing)}`);
        await fs.promises.rm(path.join(step.output, existing), { recursive: true, force: true });
      }
      for (const name of entries) {
        await movePath(path.join(stagingDir, name), path.join(step.output, name));
      }
      return [artifact(step.output, hash)];
    }
  }
}

export class BuildPipeline implements BuildRunner {
  private readonly locks = new OutputLocks();

  constructor(private readonly options: PipelineOptions) {}

  get steps(): readonly StepDefinition[] {
    return this.options.steps;
  }

  /** Steps an intent runs, in dependency order. */
  select(intent: BuildIntent): StepDefinition[] {
    const chosen = this.options.steps.filter(
      (step) => intent.categories.has(step.category) || (intent.initial && step.runsOnInitial),
    );
    const names = new Set(chosen.map((step) => step.name));
    const ordered: StepDefinition[] = [];
    const placed = new Set<StepName>();
    while (ordered.length < chosen.length) {
      const ready = chosen.filter(
        (step) => !placed.has(step.name) && step.dependsOn.every((dep) => !names.has(dep) || placed.has(dep)),
      );
      if (!ready.length) {
        throw new Error(`Build steps have a dependency cycle: ${chosen.map((s) => s.name).join(", ")}`);
      }
      for (const step of ready) {
        ordered.push(step);
        placed.add(step.name);
      }
    }
    return ordered;
  }

  async run(intent: BuildIntent, options: PipelineRunOptions): Promise<BuildOutcome> {
    const { attempt, token } = options;
    const stagingRoot = path.join(this.options.workDir, "staging", String(attempt));
    const running = new Map<StepName, Promise<BuildResult>>();

    for (const step of this.select(intent)) {
      const deps = step.dependsOn
        .map((dep) => running.get(dep))
        .filter((dep): dep is Promise<BuildResult> => dep !== undefined);
      running.set(step.name, this.runStep(step, deps, stagingRoot, token));
    }

    const results = await Promise.all(running.values());
    await fs.promises.rm(stagingRoot, { recursive: true, force: true });

    const artifacts = results.flatMap((result) =>
      result.outcome.kind === "success" ? result.outcome.artifacts : [],
    );
    const baseline = options.baseline;
    const changed = baseline ? artifacts.filter((a) => baseline(a.path) !== a.hash) : artifacts;
    let overall: OverallOutcome = "succeeded";
    if (token.canceled) {
      overall = "canceled";
    } else if (results.some((result) => result.outcome.kind === "failed")) {
      overall = "failed";
    }
    logDebug(
      `Attempt #${attempt} ${overall}: ${results.length} step(s), ${artifacts.length} artifact(s), ${changed.length} changed`,
    );
    return { attempt, intent, overall, results, artifacts, changed };
  }

  private async runStep(
    step: StepDefinition,
    deps: Promise<BuildResult>[],
    stagingRoot: string,
    token: CancellationToken,
  ): Promise<BuildResult> {
    const started = Date.now();
    const finish = (outcome: BuildResult["outcome"]): BuildResult => ({
      step: step.name,
      outcome,
      durationMs: Date.now() - started,
    });
    const skipped = (reason: SkipReason) => finish({ kind: "skipped", reason });

    const depResults = await Promise.all(deps);
    if (depResults.some((result) => result.outcome.kind !== "success")) {
      return skipped(token.canceled ? "canceled" : "dependency-failed");
    }

    const release = await this.locks.acquire(step.name);
    const stagingDir = path.join(stagingRoot, step.name);
    const discard = () => fs.promises.rm(stagingDir, { recursive: true, force: true });
    try {
      if (token.canceled) return skipped("canceled");

      await discard();
      await fs.promises.mkdir(stagingDir, { recursive: true });
      logTrace(`Step ${step.name} started`);

      let report: CollaboratorReport;
      try {
        report = await this.options.collaborators[step.collaborator]({ step, stagingDir, signal: token.signal });
      } catch (err) {
        report = { ok: false, diagnostic: describeError(err) };
      }

      if (token.canceled) {
        await discard();
        logDebug(`Step ${step.name} canceled; output discarded`);
        return skipped("canceled");
      }
      if (!report.ok) {
        await discard();
        return finish({ kind: "failed", error: new StepError(step.name, report.diagnostic) });
      }

      try {
        const artifacts = await commitStaged(step, stagingDir);
        logDebug(`Step ${step.name} finished in ${Date.now() - started}ms`);
        return finish({ kind: "success", artifacts });
      } catch (err) {
        await discard();
        return finish({ kind: "failed", error: new StepError(step.name, describeError(err)) });
      }
    } finally {
      release();
    }
  }
}

/** Pipeline over the project's step table and external tools. */
export function createBuildPipeline(config: ResolvedConfig, collaborators?: CollaboratorSet): BuildPipeline {
  return new BuildPipeline({
    steps: createStepTable(config),
    collaborators: collaborators ?? createCollaborators(config),
    workDir: config.workDir,
  });
}

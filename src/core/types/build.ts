import type { StepError } from "@core/errors";

export type Category = "ui" | "server" | "style" | "asset";

export const ALL_CATEGORIES: readonly Category[] = ["ui", "server", "style", "asset"];

export type ChangeKind = "add" | "change" | "unlink" | "addDir" | "unlinkDir";

export interface ChangeEvent {
  readonly path: string;
  readonly category: Category;
  readonly kind: ChangeKind;
  readonly timestamp: number;
}

export interface BuildIntent {
  readonly id: number;
  readonly categories: ReadonlySet<Category>;
  /** Timestamp of the first event of the window that produced this intent. */
  readonly triggeredAt: number;
  readonly paths: readonly string[];
  /** Cold builds also run steps flagged `runsOnInitial`. */
  readonly initial: boolean;
}

export type StepName = "assets" | "style" | "ui-compile" | "ui-bind" | "server";

export type CollaboratorKind =
  | "asset-copier"
  | "style-processor"
  | "ui-compiler"
  | "ui-binder"
  | "server-compiler";

/**
 * `merge` moves every staged entry into `output` (a directory), replacing same-named entries.
 * `mirror` makes `output` match the staged directory, except for `preserve`d names.
 * `file` stages one file and renames it onto `output`.
 */
export type CommitMode =
  | { kind: "merge" }
  | { kind: "mirror"; preserve: readonly string[] }
  | { kind: "file" };

export interface StepDefinition {
  readonly name: StepName;
  readonly category: Category;
  readonly collaborator: CollaboratorKind;
  readonly dependsOn: readonly StepName[];
  readonly inputs: readonly string[];
  readonly output: string;
  readonly commit: CommitMode;
  readonly runsOnInitial: boolean;
}

export interface Artifact {
  readonly step: StepName;
  readonly category: Category;
  readonly path: string;
  readonly hash: string;
}

export type SkipReason = "canceled" | "dependency-failed";

export type StepOutcome =
  | { kind: "success"; artifacts: readonly Artifact[] }
  | { kind: "failed"; error: StepError }
  | { kind: "skipped"; reason: SkipReason };

export interface BuildResult {
  readonly step: StepName;
  readonly outcome: StepOutcome;
  readonly durationMs: number;
}

export type OverallOutcome = "succeeded" | "failed" | "canceled";

export interface BuildOutcome {
  readonly attempt: number;
  readonly intent: BuildIntent;
  readonly overall: OverallOutcome;
  readonly results: readonly BuildResult[];
  /** Every artifact committed by a successful step of this attempt. */
  readonly artifacts: readonly Artifact[];
  /** Artifacts whose hash differs from the last finalized successful build. */
  readonly changed: readonly Artifact[];
}

export type ReloadDirective =
  | { kind: "full-reload" }
  | { kind: "style-patch"; href: string; css: string };

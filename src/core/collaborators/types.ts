import type { CollaboratorKind, StepDefinition } from "@core/types/build";

export interface CollaboratorRequest {
  step: StepDefinition;
  /** Empty directory owned by this step invocation; the product is written here, never to `step.output`. */
  stagingDir: string;
  /** Aborted when the attempt is superseded; collaborators may stop early. */
  signal: AbortSignal;
}

export type CollaboratorReport = { ok: true } | { ok: false; diagnostic: string };

export type Collaborator = (request: CollaboratorRequest) => Promise<CollaboratorReport>;

export type CollaboratorSet = Readonly<Record<CollaboratorKind, Collaborator>>;

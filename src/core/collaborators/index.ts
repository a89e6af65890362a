import type { CollaboratorKind } from "@core/types/build";
import type { ResolvedConfig } from "@core/types/config";
import { createAssetCopier } from "./assets";
import { createUiBinder } from "./bind";
import { createServerCompiler, createUiCompiler } from "./compile";
import { createStyleProcessor } from "./style";
import type { Collaborator, CollaboratorSet } from "./types";

function unconfigured(kind: CollaboratorKind): Collaborator {
  return async () => ({ ok: false, diagnostic: `${kind} is not configured` });
}

export function createCollaborators(config: ResolvedConfig): CollaboratorSet {
  return {
    "asset-copier": createAssetCopier(config) ?? unconfigured("asset-copier"),
    "style-processor": createStyleProcessor(config) ?? unconfigured("style-processor"),
    "ui-compiler": createUiCompiler(config) ?? unconfigured("ui-compiler"),
    "ui-binder": createUiBinder(config) ?? unconfigured("ui-binder"),
    "server-compiler": createServerCompiler(config) ?? unconfigured("server-compiler"),
  };
}

export type { Collaborator, CollaboratorReport, CollaboratorRequest, CollaboratorSet } from "./types";
export { runCommand } from "./command";

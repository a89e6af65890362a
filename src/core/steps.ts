import path from "path";
import type { ResolvedConfig } from "@core/types/config";
import type { StepDefinition } from "@core/types/build";

export function pkgOutputDir(config: ResolvedConfig): string {
  return path.join(config.siteRoot, config.pkgDir);
}

export function uiModulePath(config: ResolvedConfig): string {
  return path.join(config.workDir, "ui", `${config.name}.wasm`);
}

/** Outside the compiler's target dir; a rebuild never rewrites the running file. */
export function serverBinaryPath(config: ResolvedConfig): string {
  return path.join(config.workDir, "bin", config.name);
}

export function styleOutputPath(config: ResolvedConfig): string {
  return path.join(pkgOutputDir(config), `${config.name}.css`);
}

/** First segment of the pkg dir; the asset mirror never touches it. */
export function reservedAssetName(config: ResolvedConfig): string {
  return config.pkgDir.split(/[\\/]/).filter(Boolean)[0] ?? config.pkgDir;
}

/**
 * Static step table; every step is listed after the steps it depends on.
 * Steps whose section is missing from the configuration are left out.
 */
export function createStepTable(config: ResolvedConfig): StepDefinition[] {
  const steps: StepDefinition[] = [];
  const pkgDir = pkgOutputDir(config);

  if (config.assets) {
    steps.push({
      name: "assets",
      category: "asset",
      collaborator: "asset-copier",
      dependsOn: [],
      inputs: [config.assets.dir],
      output: config.siteRoot,
      commit: { kind: "mirror", preserve: [reservedAssetName(config)] },
      runsOnInitial: true,
    });
  }

  if (config.style) {
    steps.push({
      name: "style",
      category: "style",
      collaborator: "style-processor",
      dependsOn: [],
      inputs: [config.style.file],
      output: pkgDir,
      commit: { kind: "merge" },
      runsOnInitial: false,
    });
  }

  if (config.ui) {
    steps.push(
      {
        name: "ui-compile",
        category: "ui",
        collaborator: "ui-compiler",
        dependsOn: [],
        inputs: config.ui.roots,
        output: uiModulePath(config),
        commit: { kind: "file" },
        runsOnInitial: false,
      },
      {
        name: "ui-bind",
        category: "ui",
        collaborator: "ui-binder",
        dependsOn: ["ui-compile"],
        inputs: [uiModulePath(config)],
        output: pkgDir,
        commit: { kind: "merge" },
        runsOnInitial: false,
      },
    );
  }

  if (config.server) {
    steps.push({
      name: "server",
      category: "server",
      collaborator: "server-compiler",
      dependsOn: [],
      inputs: config.server.roots,
      output: serverBinaryPath(config),
      commit: { kind: "file" },
      runsOnInitial: false,
    });
  }

  return steps;
}

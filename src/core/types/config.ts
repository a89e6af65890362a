export type BuildProfile = "debug" | "release";

export interface ResolvedCommand {
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd: string;
}

export interface ResolvedSources {
  roots: string[];
  extensions: string[];
}

/** Fully defaulted configuration with absolute paths. Built once at startup, never mutated. */
export interface ResolvedConfig {
  rootDir: string;
  name: string;
  release: boolean;
  profile: BuildProfile;
  siteRoot: string;
  pkgDir: string;
  workDir: string;
  siteAddr: string;
  ui: (ResolvedSources & { compile: ResolvedCommand; artifact: string; bind: ResolvedCommand }) | null;
  server:
    | (ResolvedSources & {
        compile: ResolvedCommand;
        artifact: string;
        args: string[];
        env: Record<string, string>;
      })
    | null;
  style: { file: string; command: ResolvedCommand | null } | null;
  assets: { dir: string } | null;
  watch: { debounceMs: number; polling: boolean; ignore: string[] };
  reload: { host: string; port: number; sendTimeoutMs: number };
  test: { server: ResolvedCommand | null; ui: ResolvedCommand | null; e2e: ResolvedCommand | null };
  stopGraceMs: number;
}

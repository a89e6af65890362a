/**
 * An external program invoked by a build step. Arguments may contain the placeholders
 * `{name}`, `{profile}`, `{input}` and `{out}`.
 */
export interface TandemCommand {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface TandemUiConfig {
  /** Source roots whose code changes trigger a UI rebuild. */
  roots?: string[];
  extensions?: string[];
  /** Compiles the UI crate/package to the bytecode target. */
  compile: TandemCommand;
  /** Where `compile` leaves the raw bytecode module, e.g. `target/wasm32-unknown-unknown/{profile}/app.wasm`. */
  artifact: string;
  /** Generates the JS glue for the module; must write `{name}.wasm` and `{name}.js` into `{out}`. */
  bind: TandemCommand;
}

export interface TandemServerConfig {
  roots?: string[];
  extensions?: string[];
  compile: TandemCommand;
  /** Where `compile` leaves the server executable. */
  artifact: string;
  /** Arguments the server binary is launched with. */
  args?: string[];
  env?: Record<string, string>;
}

export interface TandemStyleConfig {
  /** Entry stylesheet. */
  file: string;
  /** Replaces the built-in PostCSS processing; must write `{name}.css` into `{out}`. */
  command?: TandemCommand;
}

export interface TandemAssetsConfig {
  /** Copied into the site root on every build that touches assets. */
  dir: string;
}

export interface TandemWatchConfig {
  debounceMs?: number;
  polling?: boolean;
  /** Extra paths (relative to the project root) never watched. */
  ignore?: string[];
}

export interface TandemReloadConfig {
  host?: string;
  port?: number;
  /** Per-session send timeout for reload directives. */
  sendTimeoutMs?: number;
}

export interface TandemTestConfig {
  /** Unit tests of the server package. */
  server?: TandemCommand;
  /** Unit tests of the UI package. */
  ui?: TandemCommand;
  /** End-to-end suite, run against a freshly built and running server. */
  e2e?: TandemCommand;
}

export interface TandemConfig {
  /** Output name for generated files; defaults to the project directory name. */
  name?: string;
  /** Site root served by the application. */
  siteRoot?: string;
  /** Directory under the site root for generated UI files. */
  pkgDir?: string;
  /** Internal staging and binary directory. */
  workDir?: string;
  /** `host:port` the server listens on (passed to it through the environment). */
  siteAddr?: string;
  release?: boolean;
  ui?: TandemUiConfig;
  server?: TandemServerConfig;
  style?: TandemStyleConfig;
  assets?: TandemAssetsConfig;
  watch?: TandemWatchConfig;
  reload?: TandemReloadConfig;
  test?: TandemTestConfig;
  /** Grace period between SIGTERM and SIGKILL when stopping the server. */
  stopGraceMs?: number;
}

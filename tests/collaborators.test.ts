import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createAssetCopier } from "../src/core/collaborators/assets";
import { createUiBinder } from "../src/core/collaborators/bind";
import { createServerCompiler, createUiCompiler } from "../src/core/collaborators/compile";
import { createStyleProcessor, resetPostcssCache } from "../src/core/collaborators/style";
import type { Collaborator, CollaboratorRequest } from "../src/core/collaborators/types";
import { createStepTable } from "../src/core/steps";
import type { StepName } from "../src/core/types/build";
import type { ResolvedConfig } from "../src/core/types/config";
import { makeConfig, makeTempDir, removeDir, shell, writeFile } from "./helpers";

let root: string;
let staging: string;

beforeEach(() => {
  root = makeTempDir("collaborators");
  staging = path.join(root, ".tandem", "staging", "1", "step");
  fs.mkdirSync(staging, { recursive: true });
  resetPostcssCache();
});

afterEach(() => {
  removeDir(root);
});

function request(config: ResolvedConfig, name: StepName): CollaboratorRequest {
  const step = createStepTable(config).find((candidate) => candidate.name === name);
  if (!step) throw new Error(`no step ${name}`);
  return { step, stagingDir: staging, signal: new AbortController().signal };
}

function required(collaborator: Collaborator | null): Collaborator {
  if (!collaborator) throw new Error("collaborator not configured");
  return collaborator;
}

describe("compilers", () => {
  it("runs the compiler and stages its artifact under the step's output name", async () => {
    const base = makeConfig(root);
    const config = makeConfig(root, {
      ui: base.ui && { ...base.ui, compile: shell("mkdir -p out && printf wasm > out/{name}.wasm", root) },
    });
    const report = await required(createUiCompiler(config))(request(config, "ui-compile"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "app.wasm"), "utf8")).toBe("wasm");
  });

  it("fails when the artifact is missing", async () => {
    const config = makeConfig(root);
    const report = await required(createUiCompiler(config))(request(config, "ui-compile"));
    expect(report).toEqual({
      ok: false,
      diagnostic: `compiler finished but ${path.join(root, "out", "app.wasm")} does not exist`,
    });
  });

  it("fails with the compiler's output when it exits non-zero", async () => {
    const base = makeConfig(root);
    const config = makeConfig(root, {
      server: base.server && { ...base.server, compile: shell("echo 'error: expected ;'; exit 101", root) },
    });
    const report = await required(createServerCompiler(config))(request(config, "server"));
    expect(report).toEqual({ ok: false, diagnostic: "sh failed with exit code 101\nerror: expected ;" });
  });

  it("stages the server binary as executable", async () => {
    const base = makeConfig(root);
    const config = makeConfig(root, {
      server: base.server && { ...base.server, compile: shell("mkdir -p out && printf bin > out/{name}", root) },
    });
    const report = await required(createServerCompiler(config))(request(config, "server"));
    expect(report).toEqual({ ok: true });
    expect(fs.statSync(path.join(staging, "app")).mode & 0o111).not.toBe(0);
  });
});

describe("binder", () => {
  it("renames a suffixed module and checks the glue exists", async () => {
    const base = makeConfig(root);
    const config = makeConfig(root, {
      ui: base.ui && {
        ...base.ui,
        bind: shell('cp "{input}" "{out}/{name}_bg.wasm" && printf glue > "{out}/{name}.js"', root),
      },
    });
    writeFile(path.join(config.workDir, "ui", "app.wasm"), "module");

    const report = await required(createUiBinder(config))(request(config, "ui-bind"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "app.wasm"), "utf8")).toBe("module");
    expect(fs.existsSync(path.join(staging, "app_bg.wasm"))).toBe(false);
  });

  it("fails when the binder leaves out the glue", async () => {
    const base = makeConfig(root);
    const config = makeConfig(root, {
      ui: base.ui && { ...base.ui, bind: shell('cp "{input}" "{out}/{name}.wasm"', root) },
    });
    writeFile(path.join(config.workDir, "ui", "app.wasm"), "module");
    const report = await required(createUiBinder(config))(request(config, "ui-bind"));
    expect(report).toEqual({ ok: false, diagnostic: "binder did not produce app.js" });
  });
});

describe("style processor", () => {
  it("passes the stylesheet through PostCSS without a config", async () => {
    const config = makeConfig(root);
    writeFile(config.style?.file ?? "", "a { color: red; }\n");
    const report = await required(createStyleProcessor(config))(request(config, "style"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "app.css"), "utf8")).toBe("a { color: red; }\n");
  });

  it("applies plugins from the project's PostCSS config", async () => {
    const config = makeConfig(root);
    writeFile(config.style?.file ?? "", "a { color: red; }\n");
    writeFile(
      path.join(root, "postcss.config.cjs"),
      `module.exports = {
  plugins: [
    { postcssPlugin: "upper", Once(root) { root.walkDecls((decl) => { decl.value = decl.value.toUpperCase(); }); } },
  ],
};
`,
    );
    const report = await required(createStyleProcessor(config))(request(config, "style"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "app.css"), "utf8")).toBe("a { color: RED; }\n");
  });

  it("reports a syntax error as a failure", async () => {
    const config = makeConfig(root);
    writeFile(config.style?.file ?? "", "a { color: red;\n");
    const report = await required(createStyleProcessor(config))(request(config, "style"));
    expect(report).toEqual({ ok: false, diagnostic: expect.stringContaining("Unclosed block") });
    expect(fs.existsSync(path.join(staging, "app.css"))).toBe(false);
  });

  it("uses a configured command instead of PostCSS", async () => {
    const base = makeConfig(root);
    const config = makeConfig(root, {
      style: { file: path.join(root, "style", "main.scss"), command: shell('cp "{input}" "{out}/{name}.css"', root) },
    });
    writeFile(path.join(root, "style", "main.scss"), "$c: red;");
    expect(base.style?.command).toBeNull();
    const report = await required(createStyleProcessor(config))(request(config, "style"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "app.css"), "utf8")).toBe("$c: red;");
  });
});

describe("asset copier", () => {
  it("copies the asset tree and skips the reserved pkg name", async () => {
    const config = makeConfig(root);
    writeFile(path.join(root, "public", "robots.txt"), "User-agent: *");
    writeFile(path.join(root, "public", "img", "logo.svg"), "<svg/>");
    writeFile(path.join(root, "public", "pkg", "shadow.js"), "nope");

    const report = await required(createAssetCopier(config))(request(config, "assets"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "robots.txt"), "utf8")).toBe("User-agent: *");
    expect(fs.readFileSync(path.join(staging, "img", "logo.svg"), "utf8")).toBe("<svg/>");
    expect(fs.existsSync(path.join(staging, "pkg"))).toBe(false);
  });

  it("copies index.html as an ordinary asset and reserves only the pkg dir", async () => {
    const config = makeConfig(root);
    writeFile(path.join(root, "public", "index.html"), "<html></html>");

    const report = await required(createAssetCopier(config))(request(config, "assets"));
    expect(report).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(staging, "index.html"), "utf8")).toBe("<html></html>");
    expect(request(config, "assets").step.commit).toEqual({ kind: "mirror", preserve: ["pkg"] });
  });

  it("fails when the asset dir does not exist", async () => {
    const config = makeConfig(root);
    const report = await required(createAssetCopier(config))(request(config, "assets"));
    expect(report).toEqual({ ok: false, diagnostic: `asset dir ${path.join(root, "public")} does not exist` });
  });
});

import fs from "fs";
import path from "path";
import type { ResolvedConfig } from "@core/types/config";
import type { Collaborator } from "./types";
import { describeFailure, runCommand } from "./command";
import { basePlaceholders } from "./compile";

/**
 * Generates the JS glue for the compiled module. The binder is expected to leave
 * `<name>.js` and `<name>.wasm` (or `<name>_bg.wasm`, which is renamed) in `{out}`.
 */
export function createUiBinder(config: ResolvedConfig): Collaborator | null {
  const ui = config.ui;
  if (!ui) return null;
  return async (request) => {
    const input = request.step.inputs[0];
    if (!input || !fs.existsSync(input)) {
      return { ok: false, diagnostic: `bytecode module ${input ?? "(none)"} is missing` };
    }
    const result = await runCommand(ui.bind, {
      signal: request.signal,
      placeholders: { ...basePlaceholders(config), input, out: request.stagingDir },
      label: "[bind]",
    });
    if (result.aborted) return { ok: false, diagnostic: "canceled" };
    if (result.code !== 0) return { ok: false, diagnostic: describeFailure(ui.bind, result) };

    const wasm = path.join(request.stagingDir, `${config.name}.wasm`);
    const suffixed = path.join(request.stagingDir, `${config.name}_bg.wasm`);
    if (!fs.existsSync(wasm) && fs.existsSync(suffixed)) {
      await fs.promises.rename(suffixed, wasm);
    }
    const missing = [wasm, path.join(request.stagingDir, `${config.name}.js`)].filter(
      (file) => !fs.existsSync(file),
    );
    if (missing.length) {
      return { ok: false, diagnostic: `binder did not produce ${missing.map((f) => path.basename(f)).join(", ")}` };
    }
    return { ok: true };
  };
}

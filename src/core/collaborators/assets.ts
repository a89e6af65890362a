import fs from "fs";
import path from "path";
import { logWarn } from "@cli/utils/logger";
import { reservedAssetName } from "@core/steps";
import type { ResolvedConfig } from "@core/types/config";
import type { Collaborator } from "./types";

/** Copies the asset dir into staging; the top-level entry named like the pkg dir is skipped. */
export function createAssetCopier(config: ResolvedConfig): Collaborator | null {
  const assets = config.assets;
  if (!assets) return null;
  const reserved = reservedAssetName(config);
  return async (request) => {
    if (!fs.existsSync(assets.dir)) {
      return { ok: false, diagnostic: `asset dir ${assets.dir} does not exist` };
    }
    await fs.promises.cp(assets.dir, request.stagingDir, {
      recursive: true,
      filter: (src) => {
        if (path.relative(assets.dir, src) !== reserved) return true;
        logWarn(`Skipping ${src}: "${reserved}" is reserved for generated files`);
        return false;
      },
    });
    return { ok: true };
  };
}

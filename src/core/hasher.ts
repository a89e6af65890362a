import fs from "fs";
import path from "path";
import crypto from "crypto";
import type { Artifact } from "@core/types/build";

/** Deterministic content fingerprint. */
export function hashContent(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/** Streamed; server binaries can be large. */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}

async function listFiles(root: string, dir = root, out: string[] = []): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const abs = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await listFiles(root, abs, out);
    } else if (entry.isFile()) {
      out.push(abs);
    }
  }
  return out;
}

/**
 * Hash of a directory: sha256 over `relative/path\0fileHash\n` for every file, sorted by path.
 * Paths use forward slashes.
 */
export async function hashTree(dir: string): Promise<string> {
  const files = await listFiles(dir);
  const lines = await Promise.all(
    files.map(async (file) => {
      const rel = path.relative(dir, file).split(path.sep).join("/");
      return `${rel}\0${await hashFile(file)}\n`;
    }),
  );
  lines.sort();
  return hashContent(lines.join(""));
}

export async function hashPath(target: string): Promise<string> {
  const stat = await fs.promises.stat(target);
  return stat.isDirectory() ? hashTree(target) : hashFile(target);
}

/**
 * Last-known artifact hashes of the most recent finalized successful build.
 * Kept in memory only; a cold start treats every artifact as changed.
 */
export class ArtifactLedger {
  private hashes = new Map<string, string>();

  get(artifactPath: string): string | undefined {
    return this.hashes.get(artifactPath);
  }

  isChanged(artifact: Pick<Artifact, "path" | "hash">): boolean {
    return this.hashes.get(artifact.path) !== artifact.hash;
  }

  record(artifacts: readonly Artifact[]) {
    for (const artifact of artifacts) {
      this.hashes.set(artifact.path, artifact.hash);
    }
  }

  get size(): number {
    return this.hashes.size;
  }

  clear() {
    this.hashes.clear();
  }
}

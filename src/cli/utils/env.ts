import fs from "fs";
import path from "path";

export type EnvRecord = Record<string, string>;

function parseValue(raw: string): string {
  let value = raw.trim();
  if (!value) return "";
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length > 1) {
    value = value.slice(1, -1);
    if (quote === "'") return value;
  } else {
    const comment = value.search(/\s#/);
    if (comment >= 0) value = value.slice(0, comment).trimEnd();
  }
  return value.replace(/\\n/g, "\n").replace(/\\r/g, "\r");
}

export function parseEnvFile(source: string): EnvRecord {
  const env: EnvRecord = {};
  for (const line of source.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_.]*)\s*=\s*(.*)$/);
    if (!match) continue;
    const [, key, rest] = match;
    env[key] = parseValue(rest);
  }
  return env;
}

export function envFileCandidates(mode: string): string[] {
  return [".env", ".env.local", `.env.${mode}`, `.env.${mode}.local`];
}

/**
 * Reads the `.env` files of a project, later files overriding earlier ones, and copies
 * the result into `target`. Variables already set in `target` are left alone.
 */
export function loadEnv(mode = "development", rootDir = process.cwd(), target: NodeJS.ProcessEnv = process.env): EnvRecord {
  const merged: EnvRecord = {};
  for (const name of envFileCandidates(mode)) {
    const filePath = path.resolve(rootDir, name);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    Object.assign(merged, parseEnvFile(fs.readFileSync(filePath, "utf8")));
  }

  for (const [key, value] of Object.entries(merged)) {
    if (target[key] === undefined) target[key] = value;
  }
  return merged;
}

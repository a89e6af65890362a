import path from "path";

/** True when `target` is `parent` itself or lies below it. */
export function isWithin(parent: string, target: string): boolean {
  const normalizedParent = path.resolve(parent);
  const normalizedTarget = path.resolve(target);
  return (
    normalizedTarget === normalizedParent ||
    normalizedTarget.startsWith(normalizedParent + path.sep)
  );
}

/**
 * Collapses roots nested in one another, keeping the outermost.
 * `["src", "src/app", "style"]` becomes `["src", "style"]`.
 */
export function removeNested(paths: readonly string[]): string[] {
  const result: string[] = [];
  for (const candidate of paths.map((p) => path.resolve(p))) {
    if (result.some((kept) => isWithin(kept, candidate))) continue;
    for (let i = result.length - 1; i >= 0; i--) {
      if (isWithin(candidate, result[i])) result.splice(i, 1);
    }
    result.push(candidate);
  }
  return result;
}

/** URL path a file under the site root is served from. */
export function publicPathForFile(siteRoot: string, absPath: string): string {
  const relative = path.relative(path.resolve(siteRoot), path.resolve(absPath));
  return "/" + relative.split(path.sep).join("/");
}

/** Replaces `{key}` placeholders; unknown keys are left as written. */
export function expandPlaceholders(input: string, values: Readonly<Record<string, string>>): string {
  return input.replace(/\{([a-z]+)\}/g, (match, key: string) => values[key] ?? match);
}

import fs from "fs";
import path from "path";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function fmtMs(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60_000).toFixed(1)}m`;
}

export function fmtUsd(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

/** Path with forward slashes, so provenance records read the same on every OS. */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join("/");
}

/** Keep the first occurrence of each value, in order. */
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const v of values) {
    if (seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}

/**
 * Recursively list files under `root` accepted by `accept`, sorted.
 * Directories named in `skipDirs` are not entered. Throws if `root` itself
 * cannot be read; unreadable subdirectories are reported through `onError`.
 */
export function listFilesRecursive(
  root: string,
  accept: (filePath: string) => boolean,
  options: { skipDirs?: readonly string[]; onError?: (dir: string, err: unknown) => void } = {},
): string[] {
  const skipDirs = new Set(options.skipDirs ?? []);
  const files: string[] = [];

  function walk(dir: string, isRoot: boolean) {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      if (isRoot) throw err;
      options.onError?.(dir, err);
      return;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!skipDirs.has(entry.name)) walk(full, false);
      } else if (entry.isFile() && accept(full)) {
        files.push(full);
      }
    }
  }

  walk(root, true);
  return files.sort();
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function writeJson(filePath: string, data: unknown): void {
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

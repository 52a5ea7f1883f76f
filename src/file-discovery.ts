// src/file-discovery.ts — Source tree walk
// One deterministic pass over the input root, shared by the site map and the build pipeline.

import { readdirSync, realpathSync, statSync } from "node:fs";
import { join, relative, resolve } from "node:path";
import {
  createExcludeMatcher,
  isInside,
  toPosix,
  type ExcludeMatcher,
} from "./path-classifier.js";
import { BuildError } from "./types.js";
import type { Warning } from "./types.js";

export interface SourceEntry {
  /** Absolute path on disk. */
  path: string;
  /** Input-relative POSIX path. */
  relPath: string;
  kind: "dir" | "file";
}

export interface WalkOptions {
  exclude?: readonly string[];
  /** Skipped entirely when it lies inside the input root. */
  outputDir?: string;
}

/**
 * Walk `inputRoot` recursively and return every directory and file below it,
 * parents before children, siblings in name order. Excluded paths and the
 * output directory are skipped with their whole subtree.
 *
 * A directory that cannot be read aborts the walk with a BuildError.
 */
export function walkSourceTree(
  inputRoot: string,
  options: WalkOptions = {},
  warnings: Warning[] = [],
): SourceEntry[] {
  const root = resolve(inputRoot);
  const isExcluded = createExcludeMatcher(options.exclude ?? []);
  const outputDir = options.outputDir ? resolve(options.outputDir) : undefined;
  const skipOutput = outputDir !== undefined && outputDir !== root && isInside(outputDir, root);

  const entries: SourceEntry[] = [];
  const ancestors = new Set<string>([safeRealpath(root)]);
  walkDirectory(root, root, entries, ancestors, isExcluded, skipOutput ? outputDir : undefined, warnings);
  return entries;
}

function walkDirectory(
  dir: string,
  root: string,
  results: SourceEntry[],
  /** Real paths of the directories on the current branch, root included. */
  ancestors: Set<string>,
  isExcluded: ExcludeMatcher,
  outputDir: string | undefined,
  warnings: Warning[],
): void {
  let names: string[];
  try {
    names = readdirSync(dir).sort();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Cannot read directory ${dir}: ${msg}`, dir, err);
  }

  for (const name of names) {
    const fullPath = join(dir, name);
    const relPath = toPosix(relative(root, fullPath));
    if (isExcluded(relPath)) continue;
    if (outputDir !== undefined && isInside(fullPath, outputDir)) continue;

    let stat;
    try {
      // statSync follows symlinks
      stat = statSync(fullPath);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "warn",
        module: "file-discovery",
        message: `Cannot stat ${relPath}: ${msg}`,
        file: fullPath,
      });
      continue;
    }

    if (stat.isDirectory()) {
      // Only a link back into the current branch is a cycle; other links to
      // already-walked directories are walked again under their own path
      const real = safeRealpath(fullPath);
      if (ancestors.has(real)) {
        warnings.push({
          level: "info",
          module: "file-discovery",
          message: `Skipping symlink cycle at ${relPath}`,
          file: fullPath,
        });
        continue;
      }
      results.push({ path: fullPath, relPath, kind: "dir" });
      ancestors.add(real);
      walkDirectory(fullPath, root, results, ancestors, isExcluded, outputDir, warnings);
      ancestors.delete(real);
    } else if (stat.isFile()) {
      results.push({ path: fullPath, relPath, kind: "file" });
    }
  }
}

function safeRealpath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

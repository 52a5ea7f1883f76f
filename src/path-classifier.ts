// src/path-classifier.ts — Path predicates shared by the walker, site map and link resolver

import { realpathSync } from "node:fs";
import { posix, resolve, sep } from "node:path";
import picomatch from "picomatch";
import { ConfigError, MARKDOWN_EXTENSIONS } from "./types.js";

/**
 * Split a file name into stem and extension the way a path library does:
 * a leading dot belongs to the stem (`.md` has no extension).
 */
export function splitFileName(name: string): { stem: string; ext: string } {
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return { stem: name, ext: "" };
  return { stem: name.slice(0, dot), ext: name.slice(dot + 1) };
}

function fileName(path: string): string {
  return posix.basename(path.replaceAll("\\", "/"));
}

function extensionOf(path: string): string {
  return splitFileName(fileName(path)).ext.toLowerCase();
}

export function stemOf(path: string): string {
  return splitFileName(fileName(path)).stem;
}

const CONTENT_EXTENSIONS: readonly string[] = MARKDOWN_EXTENSIONS;

export function isContentFile(path: string): boolean {
  return CONTENT_EXTENSIONS.includes(extensionOf(path));
}

export function isCsvFile(path: string): boolean {
  return extensionOf(path) === "csv";
}

/** Files that render to a page of their own (valid preview start pages). */
export function isPreviewable(path: string): boolean {
  return isContentFile(path) || isCsvFile(path);
}

export function isReadme(path: string): boolean {
  return isContentFile(path) && stemOf(path).toLowerCase() === "readme";
}

export function isIndex(path: string): boolean {
  return isContentFile(path) && stemOf(path).toLowerCase() === "index";
}

function canonical(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    // Not on disk (yet): compare the literal absolute path
    return resolve(path);
  }
}

/**
 * True when `path` is `root` or lies beneath it once both are canonicalized.
 * Used to keep an output directory nested in the input from being re-walked.
 */
export function isInside(path: string, root: string): boolean {
  const p = canonical(path);
  const r = canonical(root);
  if (p === r) return true;
  return p.startsWith(r.endsWith(sep) ? r : r + sep);
}

export type ExcludeMatcher = (relPath: string) => boolean;

/**
 * Compile exclude globs into one matcher over input-relative POSIX paths.
 */
export function createExcludeMatcher(patterns: readonly string[]): ExcludeMatcher {
  if (patterns.length === 0) return () => false;
  for (const pattern of patterns) {
    if (pattern.trim() === "") {
      throw new ConfigError(`Invalid exclude pattern: "${pattern}"`);
    }
  }
  try {
    const isMatch = picomatch([...patterns], { dot: true });
    return (relPath) => isMatch(relPath);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid exclude pattern: ${msg}`);
  }
}

/** Convert a native relative path to the POSIX form used as site map keys. */
export function toPosix(relPath: string): string {
  return sep === "/" ? relPath : relPath.split(sep).join("/");
}

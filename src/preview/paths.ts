// src/preview/paths.ts — Input root and start page for a preview session

import { existsSync, statSync } from "node:fs";
import { dirname, join, relative, resolve } from "node:path";
import { createExcludeMatcher, isInside, isPreviewable, toPosix } from "../path-classifier.js";
import { LANDING_FILENAMES, UsageError } from "../types.js";

export interface PreviewPaths {
  inputRoot: string;
  /** Absolute path of the page to open first. */
  startPage?: string;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** First of index.md, index.markdown, README.md, README.markdown present in `dir`. */
export function findLandingPage(dir: string): string | undefined {
  for (const name of LANDING_FILENAMES) {
    const candidate = join(dir, name);
    if (existsSync(candidate)) return candidate;
  }
  return undefined;
}

/**
 * A directory resolves to its landing page; a file must exist and be
 * Markdown or CSV.
 */
export function resolveStartPage(startOn: string): string {
  if (isDirectory(startOn)) {
    const landing = findLandingPage(startOn);
    if (!landing) throw new UsageError(`No index.md or README.md found in directory ${startOn}`);
    return landing;
  }
  if (!existsSync(startOn)) throw new UsageError(`Start page ${startOn} does not exist`);
  if (!isPreviewable(startOn)) {
    throw new UsageError(`Start page ${startOn} is not a Markdown or CSV file`);
  }
  return startOn;
}

/**
 * Climb from the start page's directory and return the topmost directory of
 * the first unbroken run of directories that have a landing page. Falls back
 * to the start page's own directory.
 */
export function discoverRootForStart(startPage: string): string {
  let current = dirname(startPage);
  let topmost: string | undefined;
  for (;;) {
    if (findLandingPage(current)) {
      topmost = current;
    } else if (topmost !== undefined) {
      break;
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return topmost ?? dirname(startPage);
}

export function resolvePreviewPaths(
  cwd: string,
  inputOverride?: string,
  startOn?: string,
): PreviewPaths {
  const startPage = startOn === undefined ? undefined : resolveStartPage(resolve(cwd, startOn));

  let inputRoot: string;
  if (inputOverride !== undefined) {
    inputRoot = resolve(cwd, inputOverride);
  } else if (startPage !== undefined && !isInside(startPage, cwd)) {
    inputRoot = discoverRootForStart(startPage);
  } else {
    inputRoot = resolve(cwd);
  }

  if (startPage !== undefined && !isInside(startPage, inputRoot)) {
    throw new UsageError(`Start page ${startPage} is not under input root ${inputRoot}`);
  }
  return { inputRoot, startPage };
}

/** True when the path, or any directory between it and the root, matches an exclude pattern. */
export function isExcludedPath(path: string, inputRoot: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return false;
  const isExcluded = createExcludeMatcher(patterns);
  const segments = toPosix(relative(resolve(inputRoot), resolve(path))).split("/");
  for (let i = 1; i <= segments.length; i++) {
    if (isExcluded(segments.slice(0, i).join("/"))) return true;
  }
  return false;
}

// src/site-map.ts — Page registry and directory classification for one build pass

import { isAbsolute, posix, relative, resolve, sep } from "node:path";
import { walkSourceTree, type SourceEntry, type WalkOptions } from "./file-discovery.js";
import { firstHeadingTitle } from "./markdown.js";
import { readMarkdownFile } from "./render.js";
import {
  isContentFile,
  isCsvFile,
  isIndex,
  isReadme,
  splitFileName,
  toPosix,
} from "./path-classifier.js";
import type { PageEntry, PageKind, SiteMap, Warning } from "./types.js";

/** `getting-started_guide` → `getting started guide`. */
export function humanize(name: string): string {
  return name.replace(/[-_]/g, " ");
}

export function joinRel(dir: string, name: string): string {
  return dir === "" ? name : `${dir}/${name}`;
}

function dirOf(relPath: string): string {
  const dir = posix.dirname(relPath);
  return dir === "." ? "" : dir;
}

/** Extension swapped to `.html`; CSV files keep theirs (`data.csv.html`). */
export function mechanicalOutputPath(relPath: string): string {
  if (isCsvFile(relPath)) return `${relPath}.html`;
  const name = posix.basename(relPath);
  return joinRel(dirOf(relPath), `${splitFileName(name).stem}.html`);
}

/**
 * Where links to a source page should point once the README/index rule is
 * applied: an index, or a README in a directory without one, is served as the
 * directory's `index.html`.
 */
export function hrefForSource(relPath: string, indexDirs: ReadonlySet<string>): string {
  const dir = dirOf(relPath);
  if (isIndex(relPath)) return joinRel(dir, "index.html");
  if (isReadme(relPath) && !indexDirs.has(dir)) return joinRel(dir, "index.html");
  return mechanicalOutputPath(relPath);
}

export function pageHref(siteMap: SiteMap, page: PageEntry): string {
  return hrefForSource(page.sourcePath, siteMap.indexDirs);
}

/** Every output path a page is written to. */
export function emittedPaths(page: PageEntry, indexDirs: ReadonlySet<string>): string[] {
  if (page.isIndex) return [joinRel(page.dir, "index.html")];
  if (page.isReadme && !indexDirs.has(page.dir)) {
    return [page.outputPath, joinRel(page.dir, "index.html")];
  }
  return [page.outputPath];
}

/**
 * Output-relative URL path of a start page given as an absolute path, or
 * undefined when it is not under the input root.
 */
export function outputRelPath(
  startPage: string,
  inputRoot: string,
  indexDirs: ReadonlySet<string>,
): string | undefined {
  const rel = relative(resolve(inputRoot), resolve(startPage));
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return undefined;
  return hrefForSource(toPosix(rel), indexDirs);
}

function createPageEntry(entry: SourceEntry, kind: PageKind): PageEntry {
  const name = posix.basename(entry.relPath);
  let title: string;
  if (kind === "csv") {
    title = name;
  } else {
    title =
      firstHeadingTitle(readMarkdownFile(entry.path)) ?? humanize(splitFileName(name).stem);
  }
  return {
    sourcePath: entry.relPath,
    dir: dirOf(entry.relPath),
    outputPath: mechanicalOutputPath(entry.relPath),
    title,
    kind,
    isIndex: isIndex(entry.relPath),
    isReadme: isReadme(entry.relPath),
  };
}

/** Ordinal (code unit) comparison, independent of locale. */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build the site map from an already-walked source tree.
 */
export function buildSiteMapFromEntries(root: string, entries: readonly SourceEntry[]): SiteMap {
  const siteMap: SiteMap = {
    root: resolve(root),
    pagesByDir: new Map(),
    pages: new Map(),
    indexDirs: new Set(),
    landingDirs: new Set(),
  };

  for (const entry of entries) {
    if (entry.kind !== "file") continue;
    let kind: PageKind;
    if (isContentFile(entry.relPath)) kind = "markdown";
    else if (isCsvFile(entry.relPath)) kind = "csv";
    else continue;

    const page = createPageEntry(entry, kind);
    siteMap.pages.set(page.sourcePath, page);
    const group = siteMap.pagesByDir.get(page.dir);
    if (group) group.push(page);
    else siteMap.pagesByDir.set(page.dir, [page]);

    if (page.isIndex) {
      siteMap.indexDirs.add(page.dir);
      siteMap.landingDirs.add(page.dir);
    } else if (page.isReadme) {
      siteMap.landingDirs.add(page.dir);
    }
  }

  // Array.prototype.sort is stable: equal titles keep walk (name) order
  for (const group of siteMap.pagesByDir.values()) {
    group.sort((a, b) => compareOrdinal(a.title, b.title));
  }
  return siteMap;
}

/**
 * Walk `root` once and build its site map. Directory read failures propagate.
 */
export function buildSiteMap(
  root: string,
  options: WalkOptions = {},
  warnings: Warning[] = [],
): SiteMap {
  return buildSiteMapFromEntries(root, walkSourceTree(root, options, warnings));
}

/** The page served as a directory's `index.html`: its index, else its README. */
export function landingPage(siteMap: SiteMap, dir: string): PageEntry | undefined {
  const pages = siteMap.pagesByDir.get(dir) ?? [];
  return pages.find((p) => p.isIndex) ?? pages.find((p) => p.isReadme);
}

/** True when `page` is the one served as its directory's `index.html`. */
export function isLandingPage(siteMap: SiteMap, page: PageEntry): boolean {
  return landingPage(siteMap, page.dir) === page;
}

// src/navigation.ts — Sibling navigation and breadcrumbs, relative to each page's output location

import { escapeHtml } from "./markdown.js";
import { compareOrdinal, humanize, joinRel, landingPage, isLandingPage, pageHref } from "./site-map.js";
import type { Breadcrumb, Navigation, NavLink, PageEntry, SiteMap } from "./types.js";

type Segment = { kind: "normal"; name: string } | { kind: "parent" };

function tokenize(path: string): Segment[] {
  const segments: Segment[] = [];
  for (const part of path.split("/")) {
    if (part === "" || part === ".") continue;
    segments.push(part === ".." ? { kind: "parent" } : { kind: "normal", name: part });
  }
  return segments;
}

function sameSegment(a: Segment, b: Segment): boolean {
  if (a.kind === "parent" || b.kind === "parent") return a.kind === b.kind;
  return a.name === b.name;
}

function segmentText(segment: Segment): string {
  return segment.kind === "parent" ? ".." : segment.name;
}

/**
 * Relative URL from directory `fromDir` to `toPath`, both relative to the
 * output root. Returns `.` when they are the same.
 */
export function relativeLink(fromDir: string, toPath: string): string {
  const from = tokenize(fromDir);
  const to = tokenize(toPath);
  let common = 0;
  while (common < from.length && common < to.length && sameSegment(from[common], to[common])) {
    common++;
  }
  const parts = [
    ...Array.from({ length: from.length - common }, () => ".."),
    ...to.slice(common).map(segmentText),
  ];
  return parts.length === 0 ? "." : parts.join("/");
}

function dirName(dir: string): string {
  return dir.slice(dir.lastIndexOf("/") + 1);
}

/** Label for a directory: its landing page title, else its humanized name. */
export function directoryLabel(siteMap: SiteMap, dir: string): string {
  return landingPage(siteMap, dir)?.title ?? humanize(dirName(dir));
}

function parentDir(dir: string): string | undefined {
  if (dir === "") return undefined;
  const slash = dir.lastIndexOf("/");
  return slash < 0 ? "" : dir.slice(0, slash);
}

/** Immediate child directories of `dir` that have a landing page. */
function childLandingDirs(siteMap: SiteMap, dir: string): string[] {
  return [...siteMap.landingDirs].filter((d) => d !== dir && parentDir(d) === dir);
}

/**
 * Pages sharing the page's directory (title order, self excluded), then child
 * directories with a landing page (label order).
 */
export function buildNavigation(siteMap: SiteMap, page: PageEntry): Navigation {
  const pages: NavLink[] = (siteMap.pagesByDir.get(page.dir) ?? [])
    .filter((p) => p !== page)
    .map((p) => ({ label: p.title, href: relativeLink(page.dir, pageHref(siteMap, p)) }));

  const folders: NavLink[] = childLandingDirs(siteMap, page.dir)
    .map((dir) => ({
      label: directoryLabel(siteMap, dir),
      href: relativeLink(page.dir, joinRel(dir, "index.html")),
    }))
    .sort((a, b) => compareOrdinal(a.label, b.label));

  return { pages, folders };
}

/**
 * Ancestor directories with a landing page, root first, then the page itself.
 * The page's own directory is left out when the page is that directory's
 * landing page, so it is not listed twice.
 */
export function buildBreadcrumbs(siteMap: SiteMap, page: PageEntry): Breadcrumb[] {
  const chain: string[] = [];
  for (let dir: string | undefined = page.dir; dir !== undefined; dir = parentDir(dir)) {
    chain.unshift(dir);
  }
  if (isLandingPage(siteMap, page)) chain.pop();

  const crumbs: Breadcrumb[] = chain
    .filter((dir) => siteMap.landingDirs.has(dir))
    .map((dir) => ({
      label: dir === "" ? "Home" : directoryLabel(siteMap, dir),
      href: relativeLink(page.dir, joinRel(dir, "index.html")),
    }));
  crumbs.push({ label: page.title });
  return crumbs;
}

export function renderNavHtml(nav: Navigation): string {
  if (nav.pages.length === 0 && nav.folders.length === 0) return "";
  const item = (link: NavLink) =>
    `<li><a href="${escapeHtml(link.href)}">${escapeHtml(link.label)}</a></li>`;
  let html = '<nav class="site-nav" aria-label="Pages">';
  if (nav.pages.length > 0) {
    html += `<ul class="nav-pages">${nav.pages.map(item).join("")}</ul>`;
  }
  if (nav.folders.length > 0) {
    html += `<ul class="nav-folders">${nav.folders.map(item).join("")}</ul>`;
  }
  return html + "</nav>";
}

export function renderBreadcrumbsHtml(crumbs: Breadcrumb[]): string {
  const items = crumbs.map((crumb) =>
    crumb.href === undefined
      ? `<li aria-current="page">${escapeHtml(crumb.label)}</li>`
      : `<li><a href="${escapeHtml(crumb.href)}">${escapeHtml(crumb.label)}</a></li>`,
  );
  return `<nav class="breadcrumbs" aria-label="Breadcrumb"><ol>${items.join("")}</ol></nav>`;
}

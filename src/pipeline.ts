// src/pipeline.ts — Build Pipeline
// Walk → site map → per-page render (links, navigation, template) → output tree.

import { copyFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { inlineScript } from "./assets.js";
import { renderCsvFile } from "./csv-preview.js";
import { walkSourceTree } from "./file-discovery.js";
import { vlog } from "./log.js";
import {
  buildBreadcrumbs,
  buildNavigation,
  renderBreadcrumbsHtml,
  renderNavHtml,
} from "./navigation.js";
import { renderMarkdownFile } from "./render.js";
import { buildSiteMapFromEntries, emittedPaths } from "./site-map.js";
import { slidesExtraBody, slidesExtraHead } from "./slides.js";
import { escapeHtml } from "./markdown.js";
import { BuildError } from "./types.js";
import type { BuildResult, PageEntry, RenderOptions, SiteMap, Warning } from "./types.js";

function ensureDir(path: string): void {
  try {
    mkdirSync(path, { recursive: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to create output directory ${path}: ${msg}`, path, err);
  }
}

function writeHtml(path: string, content: string): void {
  ensureDir(dirname(path));
  try {
    writeFileSync(path, content);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to write output file ${path}: ${msg}`, path, err);
  }
}

function copyAsset(from: string, to: string): void {
  ensureDir(dirname(to));
  try {
    copyFileSync(from, to);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to copy asset from ${from} to ${to}: ${msg}`, from, err);
  }
}

/** Client scripts appended to every page in preview mode. */
function previewScripts(options: RenderOptions): string {
  let html = "";
  if (options.liveReload) html += inlineScript("live-reload.js");
  if (options.heartbeat) html += inlineScript("heartbeat.js");
  return html;
}

function renderPage(
  page: PageEntry,
  content: string,
  siteMap: SiteMap,
  options: RenderOptions,
  extra: { head?: string; body?: string } = {},
): string {
  return options.template.render({
    title: escapeHtml(page.title),
    content,
    nav: renderNavHtml(buildNavigation(siteMap, page)),
    breadcrumbs: renderBreadcrumbsHtml(buildBreadcrumbs(siteMap, page)),
    extraHead: extra.head,
    extraBody: (extra.body ?? "") + previewScripts(options),
  });
}

/**
 * Render the whole input tree into `output`. Non-content files are copied
 * byte-for-byte; I/O failures abort with a BuildError; link warnings are
 * returned, never thrown.
 */
export function buildSite(input: string, output: string, options: RenderOptions): BuildResult {
  const inputRoot = resolve(input);
  const outputRoot = resolve(output);
  const warnings: Warning[] = [];
  const startTime = performance.now();

  ensureDir(outputRoot);
  const entries = walkSourceTree(inputRoot, { exclude: options.exclude, outputDir: outputRoot }, warnings);
  const siteMap = buildSiteMapFromEntries(inputRoot, entries);
  vlog(options.verbose ?? false, `Site map: ${siteMap.pages.size} pages in ${siteMap.pagesByDir.size} directories`);

  let pages = 0;
  let assets = 0;
  for (const entry of entries) {
    const target = join(outputRoot, entry.relPath);
    if (entry.kind === "dir") {
      ensureDir(target);
      continue;
    }

    const page = siteMap.pages.get(entry.relPath);
    if (page?.kind === "markdown") {
      const rendered = renderMarkdownFile(entry.path, { inputRoot, indexDirs: siteMap.indexDirs });
      const extra =
        rendered.mode === "slides" ? { head: slidesExtraHead(), body: slidesExtraBody() } : {};
      const html = renderPage(page, rendered.html, siteMap, options, extra);
      for (const outPath of emittedPaths(page, siteMap.indexDirs)) {
        writeHtml(join(outputRoot, outPath), html);
      }
      warnings.push(...rendered.warnings);
      pages++;
      continue;
    }

    copyAsset(entry.path, target);
    assets++;
    if (page?.kind === "csv") {
      const table = renderCsvFile(entry.path, options.csvMaxRows);
      writeHtml(join(outputRoot, page.outputPath), renderPage(page, table, siteMap, options));
      pages++;
    }
  }

  vlog(
    options.verbose ?? false,
    `Rendered ${pages} pages and copied ${assets} files in ${Math.round(performance.now() - startTime)}ms`,
  );
  return { pages, assets, warnings, indexDirs: siteMap.indexDirs };
}

export interface CheckOptions {
  exclude?: string[];
}

export interface CheckResult {
  /** Every diagnostic raised, link warnings included. */
  warnings: Warning[];
  /** Number of missing link targets; non-zero means the check failed. */
  linkWarnings: number;
}

/**
 * Render every Markdown page without writing anything and count the link
 * warnings.
 */
export function checkSite(input: string, options: CheckOptions = {}): CheckResult {
  const inputRoot = resolve(input);
  const warnings: Warning[] = [];
  const entries = walkSourceTree(inputRoot, { exclude: options.exclude }, warnings);
  const siteMap = buildSiteMapFromEntries(inputRoot, entries);

  let linkWarnings = 0;
  for (const entry of entries) {
    const page = siteMap.pages.get(entry.relPath);
    if (page?.kind !== "markdown") continue;
    const rendered = renderMarkdownFile(entry.path, { inputRoot, indexDirs: siteMap.indexDirs });
    linkWarnings += rendered.warnings.length;
    warnings.push(...rendered.warnings);
  }
  return { warnings, linkWarnings };
}

// src/types.ts — Shared types for the site graph engine

import type { Template } from "./template.js";

export const ENGINE_VERSION = "0.3.0";

/** Extensions rendered as Markdown pages. */
export const MARKDOWN_EXTENSIONS = ["md", "markdown"] as const;

/** Directory landing pages, in lookup order, used to resolve a start directory. */
export const LANDING_FILENAMES = [
  "index.md",
  "index.markdown",
  "README.md",
  "README.markdown",
] as const;

export const VERSION_ENDPOINT = "/__rendar_version";
export const HEARTBEAT_ENDPOINT = "/__rendar_heartbeat";

// ─── Diagnostics ─────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Site map ────────────────────────────────────────────────────────────────

export type PageKind = "markdown" | "csv";

export interface PageEntry {
  /** Input-relative path with POSIX separators, e.g. `docs/guide/intro.md`. */
  sourcePath: string;
  /** Containing directory relative to the input root; `""` for the root. */
  dir: string;
  /**
   * Output-relative path with the extension mapped mechanically
   * (`intro.md` → `intro.html`, `data.csv` → `data.csv.html`).
   */
  outputPath: string;
  title: string;
  kind: PageKind;
  isIndex: boolean;
  isReadme: boolean;
}

export interface SiteMap {
  root: string;
  /** Pages per directory, ordered by title. */
  pagesByDir: Map<string, PageEntry[]>;
  pages: Map<string, PageEntry>;
  /** Directories containing an index file. */
  indexDirs: Set<string>;
  /** Directories containing an index or a README. Superset of `indexDirs`. */
  landingDirs: Set<string>;
}

// ─── Navigation ──────────────────────────────────────────────────────────────

export interface NavLink {
  label: string;
  href: string;
}

export interface Navigation {
  pages: NavLink[];
  folders: NavLink[];
}

export interface Breadcrumb {
  label: string;
  /** Absent on the final crumb (the current page). */
  href?: string;
}

// ─── Rendering ───────────────────────────────────────────────────────────────

export type DocMode = "document" | "slides";

export interface RenderedPage {
  html: string;
  mode: DocMode;
  warnings: Warning[];
}

export interface LinkContext {
  /** Absolute path of the page containing the link. */
  sourcePath: string;
  inputRoot: string;
  indexDirs: ReadonlySet<string>;
}

export interface RenderOptions {
  template: Template;
  /** Inject the version-polling reload script. */
  liveReload?: boolean;
  /** Inject the heartbeat script used by auto-exit. */
  heartbeat?: boolean;
  exclude?: string[];
  /** Maximum CSV data rows per table; `undefined` renders every row. */
  csvMaxRows?: number;
  verbose?: boolean;
}

export interface BuildResult {
  pages: number;
  assets: number;
  warnings: Warning[];
  /** Directories holding an index page, for mapping source paths to URLs. */
  indexDirs: ReadonlySet<string>;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface PreviewFileConfig {
  port?: number;
  open?: boolean;
}

/** Contents of `rendar.toml`, with paths resolved against the file's directory. */
export interface FileConfig {
  input?: string;
  template?: string;
  exclude?: string[];
  preview?: PreviewFileConfig;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

/** Fatal filesystem failure while reading the source tree or writing output. */
export class BuildError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = "BuildError";
    if (cause !== undefined) this.cause = cause;
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Conflicting flags or an unusable start page. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

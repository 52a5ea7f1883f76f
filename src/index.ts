// src/index.ts — Library API
// Three entry points: buildSite(), checkSite() and PreviewSession.start()

export { buildSite, checkSite } from "./pipeline.js";
export type { CheckOptions, CheckResult } from "./pipeline.js";

export { buildSiteMap, buildSiteMapFromEntries, hrefForSource, outputRelPath } from "./site-map.js";
export { buildNavigation, buildBreadcrumbs, relativeLink } from "./navigation.js";
export { rewriteLinkDestination } from "./link-resolver.js";
export type { ResolvedLink } from "./link-resolver.js";
export { renderMarkdown, renderMarkdownFile } from "./render.js";
export { renderCsv, detectDelimiter } from "./csv-preview.js";
export { parseFrontMatter } from "./front-matter.js";
export { Template, loadTemplate, REQUIRED_PLACEHOLDERS } from "./template.js";
export type { TemplateSlots } from "./template.js";
export { walkSourceTree } from "./file-discovery.js";
export type { SourceEntry, WalkOptions } from "./file-discovery.js";
export { createExcludeMatcher } from "./path-classifier.js";

export { loadConfig, parseConfig } from "./config.js";

export { PreviewSession } from "./preview/session.js";
export type { PreviewSessionOptions, PreviewState } from "./preview/session.js";
export { createPreviewServer } from "./preview/server.js";
export { resolvePreviewPaths } from "./preview/paths.js";

// Re-export all public types
export type {
  Warning,
  PageKind,
  PageEntry,
  SiteMap,
  NavLink,
  Navigation,
  Breadcrumb,
  DocMode,
  RenderedPage,
  LinkContext,
  RenderOptions,
  BuildResult,
  FileConfig,
  PreviewFileConfig,
} from "./types.js";

export { BuildError, ConfigError, UsageError, ENGINE_VERSION } from "./types.js";

// src/render.ts — Page rendering: front matter, document or slides, link rewriting

import { readFileSync } from "node:fs";
import { parseFrontMatter } from "./front-matter.js";
import {
  frontMatterTableHtml,
  lexMarkdown,
  renderTokens,
  rewriteLinks,
  rewriteMermaidBlocks,
} from "./markdown.js";
import { renderSlides } from "./slides.js";
import { BuildError } from "./types.js";
import type { LinkContext, RenderedPage } from "./types.js";

/**
 * Render a Markdown document. Front matter with `mode: slides` produces a
 * slide deck; otherwise a document prefixed by a table of the front matter.
 */
export function renderMarkdown(markdown: string, ctx: LinkContext): RenderedPage {
  const { frontMatter, content } = parseFrontMatter(markdown);
  const tokens = lexMarkdown(content);
  const warnings = rewriteLinks(tokens, ctx);

  if (frontMatter.mode === "slides") {
    return { html: renderSlides(tokens), mode: "slides", warnings };
  }

  const body = rewriteMermaidBlocks(renderTokens(tokens));
  const table = frontMatterTableHtml(frontMatter);
  return { html: table ? table + body : body, mode: "document", warnings };
}

export function readMarkdownFile(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to read markdown file ${path}: ${msg}`, path, err);
  }
}

export function renderMarkdownFile(path: string, ctx: Omit<LinkContext, "sourcePath">): RenderedPage {
  return renderMarkdown(readMarkdownFile(path), { ...ctx, sourcePath: path });
}

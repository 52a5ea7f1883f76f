// src/markdown.ts — Markdown Engine
// Lexes with marked and rewrites link destinations while walking the token stream.

import { decodeHTML } from "entities";
import { Marked, type Token, type Tokens } from "marked";
import { parseFrontMatter, type FrontMatter } from "./front-matter.js";
import { rewriteLinkDestination } from "./link-resolver.js";
import type { LinkContext, Warning } from "./types.js";

const engine = new Marked({ gfm: true });

export function escapeHtml(input: string): string {
  return input
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

function isLinkToken(token: Token): token is Tokens.Link {
  return token.type === "link";
}

function isHeadingToken(token: Token): token is Tokens.Heading {
  return token.type === "heading";
}

/** Flatten inline tokens to their visible text; inline HTML tags are dropped. */
function plainText(tokens: Token[]): string {
  let out = "";
  for (const token of tokens) {
    if (token.type === "html") continue;
    if (token.type === "br") {
      out += " ";
    } else if ("tokens" in token && Array.isArray(token.tokens) && token.tokens.length > 0) {
      out += plainText(token.tokens);
    } else if ("text" in token && typeof token.text === "string") {
      out += token.text;
    }
  }
  return out;
}

/** Parse Markdown into marked's block token stream. */
export function lexMarkdown(markdown: string): Token[] {
  return engine.lexer(markdown);
}

/**
 * Text of the first non-empty heading (any level), ignoring front matter.
 */
export function firstHeadingTitle(markdown: string): string | undefined {
  const { content } = parseFrontMatter(markdown);
  for (const token of lexMarkdown(content)) {
    if (!isHeadingToken(token)) continue;
    // Text tokens carry marked's escaping and any entities written in the source
    const title = decodeHTML(plainText(token.tokens)).trim();
    if (title !== "") return title;
  }
  return undefined;
}

/**
 * Rewrite every link destination in the token stream in place.
 * Returns the warnings raised for missing Markdown targets.
 */
export function rewriteLinks(tokens: Token[], ctx: LinkContext): Warning[] {
  const warnings: Warning[] = [];
  engine.walkTokens(tokens, (token) => {
    if (!isLinkToken(token)) return;
    const resolved = rewriteLinkDestination(token.href, ctx);
    token.href = resolved.destination;
    if (resolved.warning) warnings.push(resolved.warning);
  });
  return warnings;
}

export function renderTokens(tokens: Token[]): string {
  return engine.parser(tokens);
}

const MERMAID_OPEN = '<pre><code class="language-mermaid">';
const MERMAID_CLOSE = "</code></pre>";

/** Turn fenced `mermaid` code blocks into `<pre class="mermaid">` for client-side rendering. */
export function rewriteMermaidBlocks(html: string): string {
  let output = "";
  let rest = html;
  let start = rest.indexOf(MERMAID_OPEN);
  while (start >= 0) {
    output += rest.slice(0, start) + '<pre class="mermaid">';
    const afterOpen = rest.slice(start + MERMAID_OPEN.length);
    const end = afterOpen.indexOf(MERMAID_CLOSE);
    if (end < 0) {
      output += afterOpen;
      rest = "";
      break;
    }
    output += afterOpen.slice(0, end) + "</pre>";
    rest = afterOpen.slice(end + MERMAID_CLOSE.length);
    start = rest.indexOf(MERMAID_OPEN);
  }
  return output + rest;
}

export function frontMatterTableHtml(frontMatter: FrontMatter): string | undefined {
  if (frontMatter.entries.length === 0) return undefined;
  const rows = frontMatter.entries
    .map(([key, value]) => `<tr><td>${escapeHtml(key)}</td><td>${escapeHtml(value)}</td></tr>`)
    .join("");
  return (
    '<table class="front-matter-table"><thead><tr><th>Key</th><th>Value</th></tr></thead><tbody>' +
    rows +
    "</tbody></table>"
  );
}

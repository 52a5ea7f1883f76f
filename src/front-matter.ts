// src/front-matter.ts — Best-effort `key: value` front matter
//
// The block is delimited by `---` lines (gray-matter does the splitting).
// Inside it every line is read as `key: value`, split on the first colon,
// with one layer of surrounding quotes stripped from the value. Blank lines,
// `#` comments and lines without a colon are skipped. No nesting, escaping
// or typing; a repeated key keeps its last value.

import matter from "gray-matter";

export interface FrontMatter {
  entries: Array<[string, string]>;
  /** Lower-cased `mode` value, when present. */
  mode?: string;
}

// Opening fence, optional body, closing fence; each fence alone on its line
const FENCED = /^---\r?\n(?:[\s\S]*?\r?\n)?---(?:\r?\n|$)/;

export function parseLooseEntries(block: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const raw of block.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) continue;
    const colon = line.indexOf(":");
    if (colon < 0) continue;
    const key = line.slice(0, colon).trim();
    if (key === "") continue;
    const value = line.slice(colon + 1).trim().replace(/^["']+|["']+$/g, "");
    entries.push([key, value]);
  }
  return entries;
}

function looseEngine(input: string): Record<string, string> {
  // No prototype, so keys such as `__proto__` are stored like any other
  const data: Record<string, string> = Object.create(null);
  for (const [key, value] of parseLooseEntries(input)) data[key] = value;
  return data;
}

/**
 * Split front matter from a Markdown document. Documents without a closed
 * `---` block come back untouched with no entries.
 */
export function parseFrontMatter(markdown: string): { frontMatter: FrontMatter; content: string } {
  if (!FENCED.test(markdown)) {
    return { frontMatter: { entries: [] }, content: markdown };
  }

  const file = matter(markdown, {
    language: "yaml",
    engines: { yaml: looseEngine },
  });

  const entries: Array<[string, string]> = Object.entries(file.data).map(
    ([key, value]) => [key, String(value)],
  );
  const modeEntry = entries.find(([key, value]) => key === "mode" && value !== "");
  return {
    frontMatter: { entries, mode: modeEntry?.[1].toLowerCase() },
    content: file.content,
  };
}

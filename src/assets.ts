// src/assets.ts — Built-in theme files (template, styles, client scripts)

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { BuildError } from "./types.js";

// Resolves to <package>/assets/theme from both src/ and dist/
const THEME_DIR = fileURLToPath(new URL("../assets/theme/", import.meta.url));

const cache = new Map<string, string>();

export function readThemeAsset(name: string): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const path = join(THEME_DIR, name);
  try {
    const content = readFileSync(path, "utf-8");
    cache.set(name, content);
    return content;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to read theme asset ${path}: ${msg}`, path, err);
  }
}

/** Wrap a theme script in a `<script>` element for template injection. */
export function inlineScript(name: string): string {
  return `<script>\n${readThemeAsset(name)}</script>\n`;
}

export function inlineStyle(name: string): string {
  return `<style>\n${readThemeAsset(name)}</style>\n`;
}

// src/link-resolver.ts — Rewrites link destinations found in page content to output URLs

import { existsSync } from "node:fs";
import { dirname, isAbsolute, posix, relative, resolve, sep } from "node:path";
import { isContentFile, isIndex, isReadme, splitFileName, toPosix } from "./path-classifier.js";
import type { LinkContext, Warning } from "./types.js";

export interface ResolvedLink {
  destination: string;
  warning?: Warning;
}

/**
 * Split a destination at the first `#` or `?`. The suffix keeps its marker.
 */
export function splitLink(dest: string): { path: string; suffix: string } {
  const match = /[#?]/.exec(dest);
  if (!match) return { path: dest, suffix: "" };
  return { path: dest.slice(0, match.index), suffix: dest.slice(match.index) };
}

function isPassthrough(path: string): boolean {
  return (
    path === "" ||
    path.startsWith("#") ||
    path.startsWith("http://") ||
    path.startsWith("https://") ||
    path.startsWith("mailto:") ||
    path.startsWith("tel:")
  );
}

/**
 * Collapse `.` and `..` segments. A `..` with nothing left to pop is kept on
 * relative paths and dropped on absolute ones.
 */
export function normalizeLinkPath(path: string): string {
  const absolute = path.startsWith("/");
  const parts: string[] = [];
  for (const segment of path.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      const last = parts[parts.length - 1];
      if (last !== undefined && last !== "..") {
        parts.pop();
      } else if (!absolute) {
        parts.push("..");
      }
      continue;
    }
    parts.push(segment);
  }

  if (absolute) return parts.length === 0 ? "/" : `/${parts.join("/")}`;
  return parts.length === 0 ? "." : parts.join("/");
}

/** Directory prefix of a normalized link path, with a trailing slash when non-empty. */
function parentPrefix(path: string): string {
  const slash = path.lastIndexOf("/");
  if (slash < 0) return "";
  const parent = path.slice(0, slash);
  if (parent === "" || parent === ".") return path.startsWith("/") ? "/" : "";
  return `${parent}/`;
}

/** `guide/intro.md` → `guide/intro.html`, `/intro.md` → `/intro.html`. */
export function replaceMarkdownExtension(path: string): string {
  const name = path.slice(path.lastIndexOf("/") + 1);
  return `${parentPrefix(path)}${splitFileName(name).stem}.html`;
}

/** `guide/README.md` → `guide/index.html`. */
export function toIndexHtml(path: string): string {
  return `${parentPrefix(path)}index.html`;
}

/**
 * Resolve a normalized link path on disk. Returns the absolute target and the
 * input-relative directory containing it (`undefined` when it falls outside the root).
 */
function resolveTarget(
  path: string,
  ctx: LinkContext,
): { target: string; relDir: string | undefined } {
  const root = resolve(ctx.inputRoot);
  if (path.startsWith("/")) {
    const rel = path.replace(/^\/+/, "");
    return { target: resolve(root, rel), relDir: posix.dirname(rel) === "." ? "" : posix.dirname(rel) };
  }
  const target = resolve(dirname(ctx.sourcePath), path);
  const rel = relative(root, dirname(target));
  if (rel === "") return { target, relDir: "" };
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return { target, relDir: undefined };
  return { target, relDir: toPosix(rel) };
}

/**
 * Rewrite one link destination for the output tree.
 *
 * Markdown targets become `.html`; an index becomes `index.html`; a README
 * becomes its directory's `index.html` unless that directory already has an
 * index, in which case it keeps its own name. Everything else passes through.
 * A Markdown target missing on disk yields a warning but is still rewritten.
 */
export function rewriteLinkDestination(dest: string, ctx: LinkContext): ResolvedLink {
  if (dest === "") return { destination: dest };
  const { path, suffix } = splitLink(dest);
  if (isPassthrough(path)) return { destination: dest };

  const normalized = normalizeLinkPath(path);
  if (!isContentFile(normalized)) return { destination: dest };

  const { target, relDir } = resolveTarget(normalized, ctx);
  let warning: Warning | undefined;
  if (!existsSync(target)) {
    warning = {
      level: "warn",
      module: "link-resolver",
      message: `Missing link target: ${normalized} referenced from ${ctx.sourcePath}`,
      file: ctx.sourcePath,
    };
  }

  let rewritten: string;
  if (isIndex(normalized)) {
    rewritten = toIndexHtml(normalized);
  } else if (isReadme(normalized)) {
    rewritten = ctx.indexDirs.has(relDir ?? "")
      ? replaceMarkdownExtension(normalized)
      : toIndexHtml(normalized);
  } else {
    rewritten = replaceMarkdownExtension(normalized);
  }

  return { destination: rewritten + suffix, warning };
}

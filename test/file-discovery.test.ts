import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync, symlinkSync } from "node:fs";
import { join } from "node:path";
import { walkSourceTree } from "../src/file-discovery.js";
import { BuildError } from "../src/types.js";
import type { Warning } from "../src/types.js";
import { cleanupTrees, makeTree } from "./helpers.js";

afterEach(cleanupTrees);

const FILES = {
  "a.md": "# A\n",
  "b/c.md": "# C\n",
  "b/d.txt": "plain\n",
  ".hidden/e.md": "# E\n",
  "drafts/y.md": "# Y\n",
  "out/x.html": "<p>old</p>\n",
};

describe("walkSourceTree", () => {
  it("lists parents before children, siblings in name order", () => {
    const root = makeTree(FILES);
    const entries = walkSourceTree(root);
    expect(entries.map((e) => `${e.kind}:${e.relPath}`)).toEqual([
      "dir:.hidden",
      "file:.hidden/e.md",
      "file:a.md",
      "dir:b",
      "file:b/c.md",
      "file:b/d.txt",
      "dir:drafts",
      "file:drafts/y.md",
      "dir:out",
      "file:out/x.html",
    ]);
    expect(entries[2].path).toBe(join(root, "a.md"));
  });

  it("skips excluded paths with their subtree", () => {
    const root = makeTree(FILES);
    const rels = walkSourceTree(root, { exclude: ["drafts", "**/*.txt"] }).map((e) => e.relPath);
    expect(rels).not.toContain("drafts");
    expect(rels).not.toContain("drafts/y.md");
    expect(rels).not.toContain("b/d.txt");
    expect(rels).toContain("b/c.md");
  });

  it("skips an output directory nested in the input", () => {
    const root = makeTree(FILES);
    const rels = walkSourceTree(root, { outputDir: join(root, "out") }).map((e) => e.relPath);
    expect(rels).not.toContain("out");
    expect(rels).not.toContain("out/x.html");
    expect(rels).toContain("a.md");
  });

  it("reports symlink cycles once and keeps walking", () => {
    const root = makeTree({ "b/c.md": "# C\n" });
    symlinkSync(root, join(root, "b", "loop"));
    const warnings: Warning[] = [];
    const rels = walkSourceTree(root, {}, warnings).map((e) => e.relPath);
    expect(rels).toEqual(["b", "b/c.md"]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe("Skipping symlink cycle at b/loop");
  });

  it("walks a second link to an already-walked directory", () => {
    const root = makeTree({ "common/page.md": "# Page\n", "docs/intro.md": "# Intro\n" });
    symlinkSync(join(root, "common"), join(root, "docs", "shared"));
    const warnings: Warning[] = [];
    const rels = walkSourceTree(root, {}, warnings).map((e) => e.relPath);
    expect(rels).toEqual(["common", "common/page.md", "docs", "docs/intro.md", "docs/shared", "docs/shared/page.md"]);
    expect(warnings).toEqual([]);
  });

  it("returns nothing for an empty directory", () => {
    const root = makeTree();
    mkdirSync(join(root, "empty"));
    expect(walkSourceTree(root).map((e) => e.relPath)).toEqual(["empty"]);
  });

  it("throws a BuildError when the input cannot be read", () => {
    const root = makeTree();
    expect(() => walkSourceTree(join(root, "missing"))).toThrow(BuildError);
  });
});

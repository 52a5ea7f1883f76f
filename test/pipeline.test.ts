import { describe, it, expect, afterAll } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { buildSite, checkSite } from "../src/pipeline.js";
import { Template } from "../src/template.js";
import { BuildError } from "../src/types.js";
import { cleanupTrees, makeTree } from "./helpers.js";

afterAll(cleanupTrees);

const template = Template.fromString(
  "<h1>{{title}}</h1>{{breadcrumbs}}{{nav}}<main>{{content}}</main>{{extra_head}}{{extra_body}}",
);

function sourceTree(): string {
  return makeTree({
    "README.md": "# Home\n\nSee [guide](docs/guide.md) and [gone](missing.md).\n",
    "docs/guide.md": "# Guide\n",
    "data.csv": "a,b\n1,2\n",
    "img/logo.png": "PNG",
    "drafts/wip.md": "# WIP\n",
    "deck.md": "---\nmode: slides\n---\n# One\n\n# Two\n",
    "q.md": "# Q&A\n",
  });
}

function read(root: string, rel: string): string {
  return readFileSync(join(root, rel), "utf-8");
}

describe("buildSite", () => {
  it("renders pages, copies assets and reports missing links", () => {
    const root = sourceTree();
    const out = makeTree();
    const result = buildSite(root, out, { template, exclude: ["drafts"] });

    expect(result.pages).toBe(5);
    expect(result.assets).toBe(2);
    expect(result.warnings).toEqual([
      {
        level: "warn",
        module: "link-resolver",
        message: `Missing link target: missing.md referenced from ${join(root, "README.md")}`,
        file: join(root, "README.md"),
      },
    ]);

    expect(existsSync(join(out, "README.html"))).toBe(true);
    expect(read(out, "index.html")).toBe(read(out, "README.html"));
    expect(read(out, "index.html")).toContain(
      '<a href="docs/guide.html">guide</a> and <a href="missing.html">gone</a>',
    );
    expect(read(out, "docs/guide.html")).toContain("<h1>Guide</h1>");
    expect(read(out, "img/logo.png")).toBe("PNG");
    expect(read(out, "data.csv")).toBe("a,b\n1,2\n");
    expect(read(out, "data.csv.html")).toContain("<h1>data.csv</h1>");
    expect(existsSync(join(out, "drafts"))).toBe(false);
  });

  it("builds a folder holding an index and a page that links to it", () => {
    const root = makeTree({ "a/index.md": "# A\n", "a/b.md": "# B\n\n[A](index.md)\n" });
    const out = makeTree();
    const result = buildSite(root, out, { template });

    expect(result.warnings).toEqual([]);
    expect(result.pages).toBe(2);
    expect([...result.indexDirs]).toEqual(["a"]);
    expect(read(out, "a/index.html")).toContain("<h1>A</h1>");
    expect(read(out, "a/b.html")).toContain('<main><h1>B</h1>\n<p><a href="index.html">A</a></p>\n</main>');
  });

  it("escapes titles", () => {
    const root = sourceTree();
    const out = makeTree();
    buildSite(root, out, { template });
    expect(read(out, "q.html").startsWith("<h1>Q&amp;A</h1>")).toBe(true);
  });

  it("renders slide decks with their scripts", () => {
    const root = sourceTree();
    const out = makeTree();
    buildSite(root, out, { template });
    const html = read(out, "deck.html");
    expect(html).toContain('<div class="slides-root" data-slide-count="2" tabindex="0">');
    expect(html).toContain('document.documentElement.classList.add("slides-mode");');
    expect(html).toContain("__rendarSlides");
  });

  it("injects preview scripts only when asked", () => {
    const root = sourceTree();
    const plain = makeTree();
    const preview = makeTree();
    buildSite(root, plain, { template });
    buildSite(root, preview, { template, liveReload: true, heartbeat: true });
    expect(read(plain, "index.html")).not.toContain("/__rendar_version");
    expect(read(preview, "index.html")).toContain("/__rendar_version");
    expect(read(preview, "index.html")).toContain("/__rendar_heartbeat");
  });

  it("does not walk an output directory nested in the input", () => {
    const root = sourceTree();
    const out = join(root, "site");
    buildSite(root, out, { template });
    buildSite(root, out, { template });
    expect(existsSync(join(out, "index.html"))).toBe(true);
    expect(existsSync(join(out, "site"))).toBe(false);
  });

  it("throws a BuildError for a missing input", () => {
    const root = makeTree();
    expect(() => buildSite(join(root, "nope"), join(root, "out"), { template })).toThrow(BuildError);
  });
});

describe("checkSite", () => {
  it("counts missing link targets without writing", () => {
    const root = sourceTree();
    const result = checkSite(root);
    expect(result.linkWarnings).toBe(1);
    expect(result.warnings.map((w) => w.message)).toEqual([
      `Missing link target: missing.md referenced from ${join(root, "README.md")}`,
    ]);
    expect(existsSync(join(root, "index.html"))).toBe(false);
  });

  it("passes a tree without broken links", () => {
    const root = makeTree({ "index.md": "[a](a.md)\n", "a.md": "# A\n" });
    expect(checkSite(root)).toEqual({ warnings: [], linkWarnings: 0 });
  });
});

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
  buildBreadcrumbs,
  buildNavigation,
  relativeLink,
  renderBreadcrumbsHtml,
  renderNavHtml,
} from "../src/navigation.js";
import { buildSiteMap } from "../src/site-map.js";
import type { PageEntry, SiteMap } from "../src/types.js";
import { cleanupTrees, makeTree } from "./helpers.js";

let siteMap: SiteMap;

beforeAll(() => {
  const root = makeTree({
    "index.md": "# Welcome\n",
    "zeta.md": "# Alpha page\n",
    "b-notes.md": "text\n",
    "docs/README.md": "# Docs\n",
    "docs/setup.md": "# Setup\n",
    "docs/deep/nested.md": "# Nested\n",
    "api/index.md": "# API\n",
    "assets/logo.png": "PNG",
  });
  siteMap = buildSiteMap(root);
});

afterAll(cleanupTrees);

function page(sourcePath: string): PageEntry {
  const entry = siteMap.pages.get(sourcePath);
  if (!entry) throw new Error(`no page ${sourcePath}`);
  return entry;
}

describe("relativeLink", () => {
  it("walks up and down between directories", () => {
    expect(relativeLink("", "docs/index.html")).toBe("docs/index.html");
    expect(relativeLink("docs", "index.html")).toBe("../index.html");
    expect(relativeLink("a/b", "a/c/x.html")).toBe("../c/x.html");
    expect(relativeLink("docs", "docs")).toBe(".");
  });
});

describe("buildNavigation", () => {
  it("lists sibling pages in title order and child folders with a landing page", () => {
    expect(buildNavigation(siteMap, page("index.md"))).toEqual({
      pages: [
        { label: "Alpha page", href: "zeta.html" },
        { label: "b notes", href: "b-notes.html" },
      ],
      folders: [
        { label: "API", href: "api/index.html" },
        { label: "Docs", href: "docs/index.html" },
      ],
    });
  });

  it("links a README landing page through index.html", () => {
    expect(buildNavigation(siteMap, page("docs/setup.md"))).toEqual({
      pages: [{ label: "Docs", href: "index.html" }],
      folders: [],
    });
  });

  it("skips folders without a landing page", () => {
    expect(buildNavigation(siteMap, page("docs/README.md")).folders).toEqual([]);
  });
});

describe("buildBreadcrumbs", () => {
  it("links every ancestor with a landing page", () => {
    expect(buildBreadcrumbs(siteMap, page("docs/setup.md"))).toEqual([
      { label: "Home", href: "../index.html" },
      { label: "Docs", href: "index.html" },
      { label: "Setup" },
    ]);
  });

  it("does not repeat a landing page's own directory", () => {
    expect(buildBreadcrumbs(siteMap, page("docs/README.md"))).toEqual([
      { label: "Home", href: "../index.html" },
      { label: "Docs" },
    ]);
    expect(buildBreadcrumbs(siteMap, page("index.md"))).toEqual([{ label: "Welcome" }]);
  });

  it("skips ancestors without a landing page", () => {
    expect(buildBreadcrumbs(siteMap, page("docs/deep/nested.md"))).toEqual([
      { label: "Home", href: "../../index.html" },
      { label: "Docs", href: "../index.html" },
      { label: "Nested" },
    ]);
  });
});

describe("HTML", () => {
  it("renders breadcrumbs with the current page unlinked", () => {
    expect(renderBreadcrumbsHtml([{ label: "Home", href: "../index.html" }, { label: "A & B" }])).toBe(
      '<nav class="breadcrumbs" aria-label="Breadcrumb"><ol><li><a href="../index.html">Home</a></li>' +
        '<li aria-current="page">A &amp; B</li></ol></nav>',
    );
  });

  it("renders pages and folders as separate lists", () => {
    expect(
      renderNavHtml({ pages: [{ label: "Guide", href: "guide.html" }], folders: [{ label: "API", href: "api/index.html" }] }),
    ).toBe(
      '<nav class="site-nav" aria-label="Pages"><ul class="nav-pages"><li><a href="guide.html">Guide</a></li></ul>' +
        '<ul class="nav-folders"><li><a href="api/index.html">API</a></li></ul></nav>',
    );
  });

  it("renders nothing for an empty navigation", () => {
    expect(renderNavHtml({ pages: [], folders: [] })).toBe("");
  });
});

describe("an index beside a sibling page", () => {
  it("links the sibling from the index and the index from the sibling", () => {
    const map = buildSiteMap(makeTree({ "a/index.md": "# A\n", "a/b.md": "# B\n" }));
    const index = map.pages.get("a/index.md");
    const sibling = map.pages.get("a/b.md");
    if (!index || !sibling) throw new Error("pages missing");

    expect(buildNavigation(map, index)).toEqual({ pages: [{ label: "B", href: "b.html" }], folders: [] });
    expect(buildNavigation(map, sibling)).toEqual({ pages: [{ label: "A", href: "index.html" }], folders: [] });
    expect(buildBreadcrumbs(map, index)).toEqual([{ label: "A" }]);
    expect(buildBreadcrumbs(map, sibling)).toEqual([{ label: "A", href: "index.html" }, { label: "B" }]);
  });
});

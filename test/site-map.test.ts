import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { join } from "node:path";
import {
  buildSiteMap,
  compareOrdinal,
  emittedPaths,
  hrefForSource,
  humanize,
  landingPage,
  mechanicalOutputPath,
  outputRelPath,
} from "../src/site-map.js";
import type { SiteMap } from "../src/types.js";
import { cleanupTrees, makeTree } from "./helpers.js";

let root: string;
let siteMap: SiteMap;

beforeAll(() => {
  root = makeTree({
    "index.md": "# Welcome\n",
    "zeta.md": "# Alpha page\n",
    "b-notes.md": "no heading here\n",
    "data.csv": "a,b\n1,2\n",
    "docs/README.md": "# Docs\n",
    "docs/setup.md": "# Setup\n",
    "api/index.md": "# API\n",
    "api/README.md": "# API readme\n",
    "assets/logo.png": "PNG",
  });
  siteMap = buildSiteMap(root);
});

afterAll(cleanupTrees);

describe("humanize", () => {
  it("turns dashes and underscores into spaces", () => {
    expect(humanize("getting-started_guide")).toBe("getting started guide");
  });
});

describe("compareOrdinal", () => {
  it("orders by code unit, uppercase first", () => {
    expect(["b", "B", "a", "A"].sort(compareOrdinal)).toEqual(["A", "B", "a", "b"]);
  });
});

describe("buildSiteMap", () => {
  it("registers Markdown and CSV pages only", () => {
    expect([...siteMap.pages.keys()].sort()).toEqual([
      "api/README.md",
      "api/index.md",
      "b-notes.md",
      "data.csv",
      "docs/README.md",
      "docs/setup.md",
      "index.md",
      "zeta.md",
    ]);
  });

  it("titles pages by first heading, file stem or CSV file name", () => {
    expect(siteMap.pages.get("zeta.md")?.title).toBe("Alpha page");
    expect(siteMap.pages.get("b-notes.md")?.title).toBe("b notes");
    expect(siteMap.pages.get("data.csv")?.title).toBe("data.csv");
  });

  it("orders each directory's pages by title", () => {
    expect(siteMap.pagesByDir.get("")?.map((p) => p.title)).toEqual([
      "Alpha page",
      "Welcome",
      "b notes",
      "data.csv",
    ]);
  });

  it("classifies index and landing directories", () => {
    expect([...siteMap.indexDirs].sort()).toEqual(["", "api"]);
    expect([...siteMap.landingDirs].sort()).toEqual(["", "api", "docs"]);
  });

  it("prefers the index over the README as landing page", () => {
    expect(landingPage(siteMap, "api")?.sourcePath).toBe("api/index.md");
    expect(landingPage(siteMap, "docs")?.sourcePath).toBe("docs/README.md");
    expect(landingPage(siteMap, "assets")).toBeUndefined();
  });
});

describe("output paths", () => {
  it("maps extensions mechanically", () => {
    expect(mechanicalOutputPath("docs/setup.md")).toBe("docs/setup.html");
    expect(mechanicalOutputPath("data.csv")).toBe("data.csv.html");
    expect(mechanicalOutputPath("docs/README.markdown")).toBe("docs/README.html");
  });

  it("applies the README and index rules to hrefs", () => {
    expect(hrefForSource("docs/README.md", siteMap.indexDirs)).toBe("docs/index.html");
    expect(hrefForSource("api/README.md", siteMap.indexDirs)).toBe("api/README.html");
    expect(hrefForSource("api/index.md", siteMap.indexDirs)).toBe("api/index.html");
    expect(hrefForSource("b-notes.md", siteMap.indexDirs)).toBe("b-notes.html");
  });

  it("writes an unshadowed README twice", () => {
    const readme = siteMap.pages.get("docs/README.md");
    const shadowed = siteMap.pages.get("api/README.md");
    expect(readme && emittedPaths(readme, siteMap.indexDirs)).toEqual(["docs/README.html", "docs/index.html"]);
    expect(shadowed && emittedPaths(shadowed, siteMap.indexDirs)).toEqual(["api/README.html"]);
  });

  it("maps a start page to its URL path", () => {
    expect(outputRelPath(join(root, "docs", "README.md"), root, siteMap.indexDirs)).toBe("docs/index.html");
    expect(outputRelPath(join(root, "docs", "setup.md"), root, siteMap.indexDirs)).toBe("docs/setup.html");
    expect(outputRelPath(join(root, "..", "elsewhere.md"), root, siteMap.indexDirs)).toBeUndefined();
  });
});

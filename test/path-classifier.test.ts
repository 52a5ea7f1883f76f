import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  createExcludeMatcher,
  isContentFile,
  isCsvFile,
  isIndex,
  isInside,
  isPreviewable,
  isReadme,
  splitFileName,
  stemOf,
} from "../src/path-classifier.js";
import { ConfigError } from "../src/types.js";

describe("splitFileName", () => {
  it("splits at the last dot", () => {
    expect(splitFileName("guide.v2.md")).toEqual({ stem: "guide.v2", ext: "md" });
  });

  it("treats a leading dot as part of the stem", () => {
    expect(splitFileName(".md")).toEqual({ stem: ".md", ext: "" });
  });

  it("returns an empty extension when there is no dot", () => {
    expect(splitFileName("Makefile")).toEqual({ stem: "Makefile", ext: "" });
  });
});

describe("classification", () => {
  it("recognizes Markdown extensions case-insensitively", () => {
    expect(isContentFile("docs/notes.MD")).toBe(true);
    expect(isContentFile("notes.markdown")).toBe(true);
    expect(isContentFile("notes.txt")).toBe(false);
    expect(isContentFile(".md")).toBe(false);
  });

  it("recognizes CSV files", () => {
    expect(isCsvFile("data/report.CSV")).toBe(true);
    expect(isCsvFile("report.tsv")).toBe(false);
    expect(isPreviewable("report.csv")).toBe(true);
    expect(isPreviewable("logo.png")).toBe(false);
  });

  it("detects README and index stems regardless of case", () => {
    expect(isReadme("docs/readme.markdown")).toBe(true);
    expect(isReadme("README.txt")).toBe(false);
    expect(isIndex("INDEX.md")).toBe(true);
    expect(isIndex("index.html")).toBe(false);
    expect(stemOf("a/b/README.md")).toBe("README");
  });
});

describe("isInside", () => {
  const root = join(tmpdir(), "rendar-inside-root");

  it("accepts the root and paths below it", () => {
    expect(isInside(root, root)).toBe(true);
    expect(isInside(join(root, "site", "index.html"), root)).toBe(true);
  });

  it("rejects siblings sharing a name prefix", () => {
    expect(isInside(`${root}-other`, root)).toBe(false);
  });
});

describe("createExcludeMatcher", () => {
  it("matches nothing without patterns", () => {
    expect(createExcludeMatcher([])("anything.md")).toBe(false);
  });

  it("matches input-relative paths, dotfiles included", () => {
    const isExcluded = createExcludeMatcher(["drafts", "**/*.tmp"]);
    expect(isExcluded("drafts")).toBe(true);
    expect(isExcluded(".cache/page.tmp")).toBe(true);
    expect(isExcluded("docs/page.md")).toBe(false);
  });

  it("rejects an empty pattern", () => {
    expect(() => createExcludeMatcher([" "])).toThrow(ConfigError);
  });
});

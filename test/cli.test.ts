import { describe, it, expect, afterAll, vi } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { runBuild } from "../src/bin/build.js";
import { runCheck } from "../src/bin/check.js";
import { parseCliArgs } from "../src/config.js";
import { UsageError } from "../src/types.js";
import { cleanupTrees, makeTree } from "./helpers.js";

afterAll(cleanupTrees);

describe("rendar build", () => {
  it("requires --out", async () => {
    const args = await parseCliArgs(["build", "-i", makeTree()]);
    expect(() => runBuild(args)).toThrow(new UsageError("Missing required option --out <dir>"));
  });

  it("renders the input into --out and reports it on stdout", async () => {
    const input = makeTree({ "index.md": "# Start\n" });
    const out = join(makeTree(), "site");
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    try {
      runBuild(await parseCliArgs(["build", "-i", input, "-o", out, "-q"]));
      expect(write).toHaveBeenCalledWith(`Rendered site to ${out}\n`);
    } finally {
      write.mockRestore();
    }
    expect(readFileSync(join(out, "index.html"), "utf-8")).toContain("<title>Start</title>");
  });
});

describe("rendar check", () => {
  it("fails on a broken link", async () => {
    const input = makeTree({ "index.md": "[x](missing.md)\n" });
    expect(runCheck(await parseCliArgs(["check", "-i", input, "-q"]))).toBe(true);
  });

  it("passes a clean tree", async () => {
    const input = makeTree({ "index.md": "[x](other.md)\n", "other.md": "# Other\n" });
    expect(runCheck(await parseCliArgs(["check", "-i", input, "-q"]))).toBe(false);
  });
});

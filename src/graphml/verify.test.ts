import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { verifyGraphmlFile, findProblematicContent } from "./verify";

describe("findProblematicContent", () => {
  it("counts unescaped ampersands", () => {
    expect(findProblematicContent("<a>R&D and Q&A &amp; more</a>")).toEqual([
      "Found 2 unescaped ampersands",
    ]);
  });

  it("flags unbalanced angle brackets", () => {
    expect(findProblematicContent("<a><b</a>")).toEqual([
      "Mismatched angle brackets",
    ]);
  });
});

describe("verifyGraphmlFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "verify-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports a missing file", async () => {
    const file = path.join(dir, "missing.graphml");
    expect(await verifyGraphmlFile(file)).toEqual({
      file,
      exists: false,
      size: 0,
      canParse: false,
      parseError: "File does not exist",
      nodeCount: 0,
      edgeCount: 0,
      problems: [],
    });
  });

  it("counts nodes and edges in a parseable file", async () => {
    const file = path.join(dir, "ok.graphml");
    const text =
      '<graphml><graph><node id="a"/><node id="b"/><edge source="a" target="b"/></graph></graphml>';
    await writeFile(file, text, "utf-8");

    const diagnostics = await verifyGraphmlFile(file);

    expect(diagnostics).toMatchObject({
      exists: true,
      size: text.length,
      canParse: true,
      parseError: null,
      nodeCount: 2,
      edgeCount: 1,
      problems: [],
    });
  });

  it("reports the parse error and problems without repairing", async () => {
    const file = path.join(dir, "bad.graphml");
    await writeFile(file, '<graphml><graph><node id="a">R&D</node></graph></graphml>', "utf-8");

    const diagnostics = await verifyGraphmlFile(file);

    expect(diagnostics.canParse).toBe(false);
    expect(diagnostics.parseError).toMatch(/\(line 1, column \d+\)$/);
    expect(diagnostics.problems).toEqual(["Found 1 unescaped ampersands"]);
  });
});

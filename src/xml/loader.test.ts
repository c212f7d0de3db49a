import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadXml, loadXmlFile } from "./loader";
import { FileNotFoundError, MalformedDocumentError } from "../errors";

const NS = "http://graphml.graphdrawing.org/xmlns";

const wellFormed = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="${NS}">
  <graph id="G" edgedefault="directed">
    <node id="a"><data key="label">R &amp; D</data></node>
  </graph>
</graphml>`;

const withBareAmpersand = wellFormed.replace("R &amp; D", "R & D");

describe("loadXml", () => {
  it("parses a well-formed document directly", () => {
    const result = loadXml(wellFormed);
    expect(result.stage).toBe("direct");
    expect(result.repaired).toBe(false);
    expect(result.text).toBe(wellFormed);
    expect(result.attempts).toEqual([{ stage: "direct", failure: null }]);
  });

  it("fixes a single unescaped ampersand with the escape stage alone", () => {
    const result = loadXml(new TextEncoder().encode(withBareAmpersand));
    expect(result.stage).toBe("escape");
    expect(result.repaired).toBe(true);
    expect(result.text).toBe(wellFormed);
    expect(result.attempts.map((attempt) => attempt.stage)).toEqual([
      "direct",
      "escape",
    ]);
    expect(result.attempts[1].failure).toBeNull();
  });

  it("closes an unclosed element at the structural stage", () => {
    const result = loadXml('<graphml><graph id="G"><node id="a"></graph></graphml>');
    expect(result.stage).toBe("structural");
    expect(result.document.root.namespaceUri).toBe(NS);
  });

  it("falls back to the declared encoding", () => {
    const bytes = Buffer.from(
      '<?xml version="1.0" encoding="ISO-8859-1"?><a>café</a>',
      "latin1",
    );
    const result = loadXml(bytes);
    expect(result.encoding).toBe("iso-8859-1");
    expect(result.attempts[0].failure?.message).toBe("Document is not valid UTF-8.");
    expect(result.document.root.text).toBe("café");
  });

  it("does not repair when autoFix is off", () => {
    expect(() => loadXml(withBareAmpersand, { autoFix: false })).toThrow(
      MalformedDocumentError,
    );
  });

  it("rescues a broken attribute only at the last-resort stage", () => {
    const result = loadXml('<node id="a&b"/>');

    expect(result.stage).toBe("last-resort");
    expect(result.attempts.map((attempt) => attempt.stage)).toEqual([
      "direct",
      "escape",
      "structural",
      "last-resort",
    ]);
    expect(result.text).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<node id="a&amp;b"/>',
    );
  });

  it("reports the failure where the document was written once every stage fails", () => {
    let caught: unknown;
    try {
      loadXml("<a><b>text</c></a>");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedDocumentError);
    if (!(caught instanceof MalformedDocumentError)) return;
    expect(caught.line).toBe(1);
    expect(caught.context).toContain("Line 1: <a><b>text</c></a>");
    expect(caught.message).toContain("Error location: Line 1");
  });

  it("keeps line numbers of the input when repairs add lines", () => {
    const input = '<graphml>\n<graph>\n<node id="a" x=>\n</graph>\n</graphml>';
    let caught: unknown;
    try {
      loadXml(input);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedDocumentError);
    if (!(caught instanceof MalformedDocumentError)) return;
    expect(caught.line).toBe(3);
    expect(caught.context.split("\n")).toContain('Line 3: <node id="a" x=>');
    expect(caught.context.split("\n")).toContain("Line 2: <graph>");
  });
});

describe("loadXmlFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "loader-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("throws FileNotFoundError for a missing file", async () => {
    await expect(loadXmlFile(path.join(dir, "missing.graphml"))).rejects.toThrow(
      FileNotFoundError,
    );
  });

  it("keeps a backup and overwrites the repaired file", async () => {
    const file = path.join(dir, "broken.graphml");
    await writeFile(file, withBareAmpersand, "utf-8");

    await loadXmlFile(file, { persist: { backup: true } });

    expect(await readFile(`${file}.bak`, "utf-8")).toBe(withBareAmpersand);
    expect(await readFile(file, "utf-8")).toBe(wellFormed);
  });

  it("writes the repaired text to output and leaves the input untouched", async () => {
    const file = path.join(dir, "broken.graphml");
    const output = path.join(dir, "fixed.graphml");
    await writeFile(file, withBareAmpersand, "utf-8");

    await loadXmlFile(file, { persist: { output, backup: true } });

    expect(await readFile(file, "utf-8")).toBe(withBareAmpersand);
    expect(await readFile(output, "utf-8")).toBe(wellFormed);
  });

  it("writes nothing for a document that parsed directly", async () => {
    const file = path.join(dir, "clean.graphml");
    await writeFile(file, wellFormed, "utf-8");

    const result = await loadXmlFile(file, { persist: { backup: true } });

    expect(result.repaired).toBe(false);
    await expect(readFile(`${file}.bak`)).rejects.toThrow();
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  addNamespaces,
  addEdgeDefault,
  addStandardKeys,
  fixNodeIds,
  normalizeGraphml,
  fixGraphmlFile,
} from "./fix";
import { FileNotFoundError } from "../errors";

const NS = "http://graphml.graphdrawing.org/xmlns";

describe("addNamespaces", () => {
  it("declares the full namespace set on a bare root", () => {
    expect(addNamespaces("<graphml><graph/></graphml>")).toBe(
      `<graphml xmlns="${NS}" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:y="http://www.yworks.com/xml/graphml" xsi:schemaLocation="${NS} ${NS}/1.0/graphml.xsd"><graph/></graphml>`,
    );
  });

  it("only adds what is missing", () => {
    const result = addNamespaces(`<graphml xmlns="${NS}"/>`);
    expect(result.split(" xmlns=").length).toBe(2);
    expect(result).toContain('xmlns:y="http://www.yworks.com/xml/graphml"');
  });
});

describe("addEdgeDefault", () => {
  it("adds edgedefault to a graph lacking it", () => {
    expect(addEdgeDefault('<graphml><graph id="G"></graph></graphml>')).toBe(
      '<graphml><graph edgedefault="directed" id="G"></graph></graphml>',
    );
  });

  it("keeps an existing edgedefault", () => {
    const text = '<graph id="G" edgedefault="undirected"/>';
    expect(addEdgeDefault(text)).toBe(text);
  });
});

describe("addStandardKeys", () => {
  it("inserts the standard keys after the root tag", () => {
    const result = addStandardKeys("<graphml><graph/></graphml>");
    expect(
      result.startsWith(
        '<graphml>\n  <key id="d0" for="node" attr.name="label" attr.type="string"/>',
      ),
    ).toBe(true);
    expect(result.match(/<key /g)).toHaveLength(8);
  });

  it("leaves documents that declare keys alone", () => {
    const text = '<graphml><key id="k" for="node" attr.name="x"/><graph/></graphml>';
    expect(addStandardKeys(text)).toBe(text);
  });
});

describe("fixNodeIds", () => {
  it("prefixes numeric ids and rewrites edge endpoints", () => {
    expect(
      fixNodeIds('<graph><node id="1"/><edge source="1" target="2"/></graph>'),
    ).toBe('<graph><node id="n_1"/><edge source="n_1" target="2"/></graph>');
  });
});

describe("normalizeGraphml", () => {
  it("reports which fixes changed the text", () => {
    const { fixes } = normalizeGraphml(
      '<graphml><graph id="G"><node id="1"/></graph></graphml>',
    );
    expect(fixes).toEqual(["namespaces", "edge-default", "keys", "node-ids"]);
  });

  it("changes nothing in a complete document", () => {
    const { text } = normalizeGraphml(
      addNamespaces(
        '<graphml><key id="d0" for="node" attr.name="label"/><graph id="G" edgedefault="directed"><node id="a"/></graph></graphml>',
      ),
    );
    expect(normalizeGraphml(text)).toEqual({ text, fixes: [] });
  });
});

describe("fixGraphmlFile", () => {
  let dir: string;
  const broken = `<graphml xmlns="${NS}"><key id="d0" for="node" attr.name="label"/><graph id="G" edgedefault="directed"><node id="1"><data key="d0">R & D</data></node></graph></graphml>`;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "fix-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("backs up and overwrites by default", async () => {
    const file = path.join(dir, "broken.graphml");
    await writeFile(file, broken, "utf-8");

    const result = await fixGraphmlFile(file, { backup: true });

    expect(result).toEqual({
      output: file,
      backup: `${file}.bak`,
      stage: "escape",
      fixes: ["namespaces", "node-ids"],
    });
    expect(await readFile(`${file}.bak`, "utf-8")).toBe(broken);
    const fixed = await readFile(file, "utf-8");
    expect(fixed).toContain('<node id="n_1"><data key="d0">R &amp; D</data></node>');
  });

  it("writes <stem>_fixed beside the input without a backup", async () => {
    const file = path.join(dir, "broken.graphml");
    await writeFile(file, broken, "utf-8");

    const result = await fixGraphmlFile(file, { backup: false });

    expect(result.output).toBe(path.join(dir, "broken_fixed.graphml"));
    expect(result.backup).toBeNull();
    expect(await readFile(file, "utf-8")).toBe(broken);
  });

  it("writes to an explicit output", async () => {
    const file = path.join(dir, "broken.graphml");
    const output = path.join(dir, "out.graphml");
    await writeFile(file, broken, "utf-8");

    const result = await fixGraphmlFile(file, { output, backup: true });

    expect(result.output).toBe(output);
    expect(result.backup).toBeNull();
    expect(await readFile(file, "utf-8")).toBe(broken);
  });

  it("throws FileNotFoundError for a missing file", async () => {
    await expect(
      fixGraphmlFile(path.join(dir, "missing.graphml"), { backup: true }),
    ).rejects.toThrow(FileNotFoundError);
  });
});

import { describe, it, expect } from "vitest";
import { splitSpans, positionAt, opensMarkup } from "./spans";

describe("splitSpans", () => {
  it("splits tags from text", () => {
    expect(splitSpans("<a>hi</a>")).toEqual([
      { kind: "tag", value: "<a>", start: 0 },
      { kind: "text", value: "hi", start: 3 },
      { kind: "tag", value: "</a>", start: 5 },
    ]);
  });

  it("keeps '>' inside quoted attribute values in the tag", () => {
    const spans = splitSpans('<a x="1>2">t &amp; u</a>');
    expect(spans.map((span) => span.value)).toEqual([
      '<a x="1>2">',
      "t &amp; u",
      "</a>",
    ]);
    expect(spans[1].start).toBe(11);
  });

  it("treats '<' followed by a space as text", () => {
    expect(splitSpans("<p>a < b</p>").map((span) => span.kind)).toEqual([
      "tag",
      "text",
      "tag",
    ]);
  });

  it("keeps comments and CDATA as single spans", () => {
    const spans = splitSpans("<a><!-- <b> --><![CDATA[x < y]]></a>");
    expect(spans.map((span) => [span.kind, span.value])).toEqual([
      ["tag", "<a>"],
      ["comment", "<!-- <b> -->"],
      ["cdata", "<![CDATA[x < y]]>"],
      ["tag", "</a>"],
    ]);
  });

  it("runs an unterminated comment to the end", () => {
    const spans = splitSpans("<a><!-- open <b>");
    expect(spans[1]).toEqual({ kind: "comment", value: "<!-- open <b>", start: 3 });
  });
});

describe("opensMarkup", () => {
  it("accepts names, closers and declarations", () => {
    expect(opensMarkup("<a", 0)).toBe(true);
    expect(opensMarkup("</a", 0)).toBe(true);
    expect(opensMarkup("<?xml", 0)).toBe(true);
    expect(opensMarkup("< a", 0)).toBe(false);
    expect(opensMarkup("<3", 0)).toBe(false);
  });
});

describe("positionAt", () => {
  it("returns 1-based line and column", () => {
    expect(positionAt("ab\ncd", 0)).toEqual({ line: 1, column: 1 });
    expect(positionAt("ab\ncd", 4)).toEqual({ line: 2, column: 2 });
  });
});

import { describe, it, expect } from "vitest";
import { renderCsvRows, renderCsv, quoteField } from "./csv";
import { GraphModelBuilder } from "../graph/model";

function twoNodeGraph() {
  const builder = new GraphModelBuilder();
  builder.addNode(
    "a",
    new Map([
      ["label", "Alpha"],
      ["type", "start"],
      ["resp", "plan"],
      ["team", "ops"],
    ]),
  );
  builder.addNode("b");
  builder.addEdge("a", "b", new Map([["label", "go"]]));
  return builder.build();
}

describe("renderCsvRows", () => {
  it("writes a page row, node rows and edge rows", () => {
    const rows = renderCsvRows(twoNodeGraph());

    expect(rows).toHaveLength(4);
    expect(rows.map((row) => [row.Id, row.Name])).toEqual([
      ["1", "Page"],
      ["2", "Terminator"],
      ["3", "Process"],
      ["4", "Line"],
    ]);
    expect(rows[3]["Line Source"]).toBe(rows[1].Id);
    expect(rows[3]["Line Destination"]).toBe(rows[2].Id);
  });

  it("fills node and edge columns", () => {
    const [, alpha, , line] = renderCsvRows(twoNodeGraph());

    expect(alpha).toMatchObject({
      "Shape Library": "Flowchart Shapes",
      "Page ID": "1",
      "Text Area 1": "Alpha",
      "Text Area 2": "plan",
      "Text Area 3": "ops",
    });
    expect(line).toMatchObject({
      "Source Arrow": "None",
      "Destination Arrow": "Arrow",
      "Text Area 1": "go",
    });
  });

  it("skips dangling edges", () => {
    const builder = new GraphModelBuilder();
    builder.addNode("a");
    builder.addEdge("a", "ghost");
    expect(renderCsvRows(builder.build())).toHaveLength(2);
  });
});

describe("renderCsv", () => {
  it("writes a header and CRLF-terminated rows", () => {
    const lines = renderCsv(twoNodeGraph()).split("\r\n");

    expect(lines[0]).toBe(
      "Id,Name,Shape Library,Page ID,Contained By,Line Source,Line Destination,Source Arrow,Destination Arrow,Text Area 1,Text Area 2,Text Area 3",
    );
    expect(lines[1]).toBe("1,Page,,,,,,,,Page 1,,");
    expect(lines[4]).toBe("4,Line,,1,,2,3,None,Arrow,go,,");
    expect(lines[5]).toBe("");
  });
});

describe("quoteField", () => {
  it("quotes fields with commas, quotes or line breaks", () => {
    expect(quoteField("plain")).toBe("plain");
    expect(quoteField("a,b")).toBe('"a,b"');
    expect(quoteField('say "hi"')).toBe('"say ""hi"""');
    expect(quoteField("two\nlines")).toBe('"two\nlines"');
  });
});

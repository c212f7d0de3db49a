/**
 * Tabular renderer
 * Diagram-import CSV: a page row, one row per node, one row per edge.
 */

import { edgeLabel } from "../graph/model";
import { classifyNode } from "./shapes";
import type { NodeShape } from "./shapes";
import { CSV_COLUMNS } from "../types";
import type { CsvRow, GraphModel } from "../types";

const SHAPE_NAMES: Record<NodeShape, string> = {
  start: "Terminator",
  end: "Terminator",
  decision: "Decision",
  io: "Data",
  process: "Process",
};

const SHAPE_LIBRARY = "Flowchart Shapes";
const PAGE_ID = "1";

function emptyRow(id: number): CsvRow {
  return {
    Id: String(id),
    Name: "",
    "Shape Library": "",
    "Page ID": "",
    "Contained By": "",
    "Line Source": "",
    "Line Destination": "",
    "Source Arrow": "",
    "Destination Arrow": "",
    "Text Area 1": "",
    "Text Area 2": "",
    "Text Area 3": "",
  };
}

/**
 * Build the rows: page row 1, node rows from 2, then edge rows
 *
 * Edges whose source or target is not a node are left out.
 */
export function renderCsvRows(graph: GraphModel): CsvRow[] {
  let nextId = 1;
  const rows: CsvRow[] = [
    { ...emptyRow(nextId++), Name: "Page", "Text Area 1": "Page 1" },
  ];

  const rowIds = new Map<string, string>();
  for (const node of graph.nodes) {
    const row: CsvRow = {
      ...emptyRow(nextId++),
      Name: SHAPE_NAMES[classifyNode(node)],
      "Shape Library": SHAPE_LIBRARY,
      "Page ID": PAGE_ID,
      "Text Area 1": node.name,
      "Text Area 2": node.properties.get("resp") ?? "",
      "Text Area 3": node.properties.get("team") ?? "",
    };
    rowIds.set(node.id, row.Id);
    rows.push(row);
  }

  for (const edge of graph.edges) {
    const source = rowIds.get(edge.source);
    const target = rowIds.get(edge.target);
    if (source === undefined || target === undefined) continue;

    rows.push({
      ...emptyRow(nextId++),
      Name: "Line",
      "Page ID": PAGE_ID,
      "Line Source": source,
      "Line Destination": target,
      "Source Arrow": "None",
      "Destination Arrow": "Arrow",
      "Text Area 1": edgeLabel(edge) ?? "",
    });
  }

  return rows;
}

/**
 * Quote a field when it holds a comma, a quote or a line break
 */
export function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialise rows with a header line; lines end in CRLF
 */
export function toCsv(rows: readonly CsvRow[]): string {
  const lines = [
    CSV_COLUMNS.join(","),
    ...rows.map((row) =>
      CSV_COLUMNS.map((column) => quoteField(row[column])).join(","),
    ),
  ];
  return lines.map((line) => `${line}\r\n`).join("");
}

export function renderCsv(graph: GraphModel): string {
  return toCsv(renderCsvRows(graph));
}

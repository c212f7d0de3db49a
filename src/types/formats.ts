/**
 * Input/output formats and the tabular column layout
 */

export type InputFormat = "json" | "graphml";
export type TargetFormat = "graphml" | "uml" | "csv";

export const INPUT_EXTENSIONS: Record<InputFormat, readonly string[]> = {
  json: [".json"],
  graphml: [".graphml", ".xml"],
};

export const TARGET_EXTENSIONS: Record<TargetFormat, string> = {
  graphml: ".graphml",
  uml: ".uml",
  csv: ".csv",
};

export const CSV_COLUMNS = [
  "Id",
  "Name",
  "Shape Library",
  "Page ID",
  "Contained By",
  "Line Source",
  "Line Destination",
  "Source Arrow",
  "Destination Arrow",
  "Text Area 1",
  "Text Area 2",
  "Text Area 3",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type CsvRow = Record<CsvColumn, string>;

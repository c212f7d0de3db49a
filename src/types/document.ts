/**
 * Parsed XML document tree produced by the loader
 */

export interface XmlAttribute {
  name: string;
  value: string;
}

export interface XmlElement {
  // Tag as written, e.g. "graph" or "y:ShapeNode"
  tag: string;
  localName: string;
  prefix: string | null;
  // Resolved from xmlns / xmlns:prefix declarations in scope
  namespaceUri: string | null;
  attributes: XmlAttribute[];
  // Direct text and CDATA content, concatenated
  text: string;
  children: XmlElement[];
}

export interface ParsedDocument {
  root: XmlElement;
}

export interface ParseFailure {
  message: string;
  line: number;
  column: number;
}

export type ParseOutcome =
  | { ok: true; document: ParsedDocument }
  | { ok: false; failure: ParseFailure };

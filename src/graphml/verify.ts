/**
 * GraphML diagnostics
 * Reports whether a file parses as-is, without running any repair.
 */

import { readFile, stat } from "fs/promises";
import { parseXml } from "../xml/parser";
import { fileExists } from "../utils/file-exists";
import type { XmlElement } from "../types";

export interface GraphmlDiagnostics {
  file: string;
  exists: boolean;
  size: number;
  canParse: boolean;
  parseError: string | null;
  nodeCount: number;
  edgeCount: number;
  problems: string[];
}

const UNESCAPED_AMPERSAND = /&(?!amp;|lt;|gt;|quot;|apos;)[a-zA-Z0-9]/g;

/**
 * Textual red flags, checked whether or not the document parses
 */
export function findProblematicContent(text: string): string[] {
  const problems: string[] = [];

  const ampersands = text.match(UNESCAPED_AMPERSAND)?.length ?? 0;
  if (ampersands > 0) {
    problems.push(`Found ${ampersands} unescaped ampersands`);
  }

  const opening = text.split("<").length;
  const closing = text.split(">").length;
  if (opening !== closing) {
    problems.push("Mismatched angle brackets");
  }

  return problems;
}

function countDescendants(element: XmlElement, localName: string): number {
  return element.children.reduce(
    (total, child) =>
      total +
      (child.localName === localName ? 1 : 0) +
      countDescendants(child, localName),
    0,
  );
}

export async function verifyGraphmlFile(
  path: string,
): Promise<GraphmlDiagnostics> {
  const diagnostics: GraphmlDiagnostics = {
    file: path,
    exists: false,
    size: 0,
    canParse: false,
    parseError: null,
    nodeCount: 0,
    edgeCount: 0,
    problems: [],
  };

  if (!(await fileExists(path))) {
    diagnostics.parseError = "File does not exist";
    return diagnostics;
  }

  diagnostics.exists = true;
  diagnostics.size = (await stat(path)).size;

  // Undecodable bytes become U+FFFD so the content checks still run
  const text = new TextDecoder("utf-8").decode(await readFile(path));
  diagnostics.problems = findProblematicContent(text);

  const outcome = parseXml(text);
  if (!outcome.ok) {
    const { message, line, column } = outcome.failure;
    diagnostics.parseError = `${message} (line ${line}, column ${column})`;
    return diagnostics;
  }

  const { root } = outcome.document;
  diagnostics.canParse = true;
  diagnostics.nodeCount = countDescendants(root, "node");
  diagnostics.edgeCount = countDescendants(root, "edge");
  return diagnostics;
}

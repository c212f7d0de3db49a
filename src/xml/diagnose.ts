/**
 * Failure reporting for documents the repair ladder could not fix
 */

import { MalformedDocumentError } from "../errors";
import { hasBareAmpersand } from "./entities";
import type { ParseFailure } from "../types";

const count = (value: string, char: string): number =>
  value.split(char).length - 1;

/**
 * Pattern checks against the line a parser failed on
 */
export function diagnoseLine(line: string): string[] {
  const diagnosis: string[] = [];

  if (hasBareAmpersand(line)) {
    diagnosis.push("Unescaped '&' character. Replace with '&amp;'");
  }
  if (count(line, "<") !== count(line, ">")) {
    diagnosis.push("Mismatched angle brackets '<' and '>'");
  }
  if (count(line, '"') % 2 !== 0) {
    diagnosis.push("Unclosed quote");
  }
  if (count(line, "'") % 2 !== 0) {
    diagnosis.push("Unclosed single quote");
  }
  if (line.includes("<?xml") && !line.includes("?>")) {
    diagnosis.push("Unclosed XML declaration");
  }

  return diagnosis;
}

/**
 * Offending line with one line of context on each side and a caret under
 * the reported column
 *
 * @example
 * Line 2:   <node id="a">
 * Line 3:     <data key="d0">R & D</data>
 *                                ^ Error occurs near here
 * Line 4:   </node>
 */
export function renderErrorContext(
  text: string,
  line: number,
  column: number,
): string {
  const lines = text.split(/\r?\n/);
  const index = line - 1;
  if (index < 0 || index >= lines.length) {
    return "";
  }

  const rendered: string[] = [];
  if (index > 0) {
    rendered.push(`Line ${line - 1}: ${lines[index - 1]}`);
  }
  const prefix = `Line ${line}: `;
  rendered.push(`${prefix}${lines[index]}`);
  rendered.push(
    `${" ".repeat(prefix.length + Math.max(column - 1, 0))}^ Error occurs near here`,
  );
  if (index + 1 < lines.length) {
    rendered.push(`Line ${line + 1}: ${lines[index + 1]}`);
  }
  return rendered.join("\n");
}

export function createMalformedDocumentError(
  failure: ParseFailure,
  text: string,
): MalformedDocumentError {
  const offending = text.split(/\r?\n/)[failure.line - 1] ?? "";
  return new MalformedDocumentError({
    reason: failure.message,
    line: failure.line,
    column: failure.column,
    context: renderErrorContext(text, failure.line, failure.column),
    diagnosis: diagnoseLine(offending),
  });
}

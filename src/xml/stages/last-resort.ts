/**
 * Last-resort stage
 * Normalizes entity references and encoding artifacts across the document,
 * then re-escapes the one line the previous parse attempt failed on.
 */

import { decodeHTML, escapeUTF8 } from "entities";
import { opensMarkup } from "../spans";
import { BARE_AMPERSAND, isXmlEntityName } from "../entities";
import type { RepairStage } from "./types";

const NAMED_REFERENCE = /&([A-Za-z][A-Za-z0-9]*);/g;

// Windows-1252 characters in 0x80-0x9F, keyed by code point
const WINDOWS_1252_HIGH = new Map<number, number>([
  [0x20ac, 0x80], [0x201a, 0x82], [0x0192, 0x83], [0x201e, 0x84],
  [0x2026, 0x85], [0x2020, 0x86], [0x2021, 0x87], [0x02c6, 0x88],
  [0x2030, 0x89], [0x0160, 0x8a], [0x2039, 0x8b], [0x0152, 0x8c],
  [0x017d, 0x8e], [0x2018, 0x91], [0x2019, 0x92], [0x201c, 0x93],
  [0x201d, 0x94], [0x2022, 0x95], [0x2013, 0x96], [0x2014, 0x97],
  [0x02dc, 0x98], [0x2122, 0x99], [0x0161, 0x9a], [0x203a, 0x9b],
  [0x0153, 0x9c], [0x017e, 0x9e], [0x0178, 0x9f],
]);

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Replace HTML-only named references with the characters they stand for and
 * escape the '&' of names nobody defines
 */
export function normalizeReferences(text: string): string {
  return text.replace(NAMED_REFERENCE, (reference: string, name: string) => {
    if (isXmlEntityName(name)) return reference;

    const decoded = decodeHTML(reference);
    if (decoded === reference) return `&amp;${name};`;

    // Keep line numbers stable for the targeted re-escape below
    return escapeUTF8(decoded).replace(/\r?\n/g, "&#10;");
  });
}

function encodeWindows1252(value: string): Uint8Array | null {
  const bytes: number[] = [];
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    const high = WINDOWS_1252_HIGH.get(code);
    if (high !== undefined) {
      bytes.push(high);
    } else if (code <= 0xff) {
      bytes.push(code);
    } else {
      return null;
    }
  }
  return Uint8Array.from(bytes);
}

/**
 * Undo UTF-8 text that was decoded as Windows-1252 ("cafÃ©" -> "café")
 * A run is only replaced when its bytes form valid UTF-8.
 */
export function repairMojibake(text: string): string {
  return text.replace(/[^\x00-\x7F]{2,}/g, (run) => {
    const bytes = encodeWindows1252(run);
    if (!bytes) return run;
    try {
      return utf8.decode(bytes);
    } catch {
      return run;
    }
  });
}

/**
 * Escape stray '&' and '<' on one 1-based line
 */
export function reescapeLine(text: string, line: number): string {
  const lines = text.split("\n");
  const index = line - 1;
  if (index < 0 || index >= lines.length) {
    return text;
  }

  const target = lines[index].replace(BARE_AMPERSAND, "&amp;");
  let escaped = "";
  for (let i = 0; i < target.length; i++) {
    escaped += target[i] === "<" && !opensMarkup(target, i) ? "&lt;" : target[i];
  }
  lines[index] = escaped;
  return lines.join("\n");
}

export const lastResortStage: RepairStage = {
  name: "last-resort",
  description: "normalize references and re-escape the failing line",
  apply: (text, { previousFailure }) => {
    let result = normalizeReferences(text);
    result = repairMojibake(result);
    return previousFailure ? reescapeLine(result, previousFailure.line) : result;
  },
};

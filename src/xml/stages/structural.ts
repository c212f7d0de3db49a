/**
 * Structural repair stage
 * Fixes problems escaping alone cannot: stray control characters, a broken or
 * missing XML declaration, a namespace-less GraphML root, unclosed tags and
 * entity references missing their ';'.
 */

import { splitSpans } from "../spans";
import { isHtmlEntityName, isXmlEntityName } from "../entities";
import type { RepairStage } from "./types";

export const DEFAULT_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

// C0 controls except tab, LF and CR; DEL; zero-width and direction marks; BOM
const UNPRINTABLE =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u200B-\u200F\uFEFF]/g;

const DECLARATION = /<\?xml(?=\s)[^<>]*>?/;

const TAG_NAME = /^<(\/?)([A-Za-z_][\w.:-]*)/;

const TRUNCATED_REFERENCE =
  /&(#[0-9]+|#x[0-9a-fA-F]+|[A-Za-z][A-Za-z0-9]*)(?![;A-Za-z0-9])/g;

export function stripUnprintable(text: string): string {
  return text.replace(UNPRINTABLE, "");
}

/**
 * Terminate an unterminated declaration, move it to the very start, or add
 * one when the document has none
 */
export function repairDeclaration(text: string): string {
  const match = DECLARATION.exec(text);
  if (!match) {
    return `${DEFAULT_DECLARATION}\n${text}`;
  }

  const written = match[0];
  const declaration = written.trimEnd().replace(/\??>?$/, "").trimEnd() + "?>";
  const before = text.slice(0, match.index);
  const after = text.slice(match.index + written.length);

  if (declaration === written && before === "") {
    return text;
  }

  // A declaration after other content is moved to the front
  const separator = /^\s/.test(after) ? "" : "\n";
  return before.trim() === ""
    ? `${declaration}${separator}${after}`
    : `${declaration}\n${before}${after}`;
}

/**
 * Declare `namespace` as the default namespace of a <graphml> root lacking one
 */
export function injectDefaultNamespace(text: string, namespace: string): string {
  const root = /<graphml\b([^>]*)>/.exec(text);
  if (!root || /\bxmlns\s*=/.test(root[1])) {
    return text;
  }
  const index = root.index + "<graphml".length;
  return `${text.slice(0, index)} xmlns="${namespace}"${text.slice(index)}`;
}

/**
 * Close tags that were opened but never closed
 *
 * An element left open inside another is closed just before the enclosing
 * element's closing tag; anything still open at the end is closed there,
 * innermost first.
 */
export function closeUnclosedTags(text: string): string {
  const pieces: string[] = [];
  const open: string[] = [];

  for (const span of splitSpans(text)) {
    const match = span.kind === "tag" ? TAG_NAME.exec(span.value) : null;

    if (match && span.value.endsWith(">") && !span.value.endsWith("/>")) {
      const [, slash, name] = match;
      if (!slash) {
        open.push(name);
      } else if (open.includes(name)) {
        for (let top = open.pop(); top !== name && top !== undefined; top = open.pop()) {
          pieces.push(`</${top}>`);
        }
      }
    }

    pieces.push(span.value);
  }

  for (let top = open.pop(); top !== undefined; top = open.pop()) {
    pieces.push(`</${top}>`);
  }

  return pieces.join("");
}

/**
 * Add the missing ';' to references such as "&lt", "&#169" or "&nbsp"
 * Unknown names are left for the last-resort stage.
 */
export function completeTruncatedReferences(text: string): string {
  return text.replace(TRUNCATED_REFERENCE, (reference: string, name: string) => {
    const known =
      name.startsWith("#") || isXmlEntityName(name) || isHtmlEntityName(name);
    return known ? `&${name};` : reference;
  });
}

export const structuralStage: RepairStage = {
  name: "structural",
  description: "repair declaration, namespace, unclosed tags and references",
  apply: (text, { namespace }) => {
    let result = stripUnprintable(text);
    result = repairDeclaration(result);
    result = injectDefaultNamespace(result, namespace);
    result = closeUnclosedTags(result);
    return completeTruncatedReferences(result);
  },
};

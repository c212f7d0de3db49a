/**
 * Strict XML parser
 * Rejects anything that is not well-formed and reports where it failed.
 */

import { XMLValidator } from "fast-xml-parser";
import { load } from "cheerio";
import { isCDATA, isTag, isText } from "domhandler";
import type { ChildNode, Element } from "domhandler";
import { splitSpans, positionAt } from "./spans";
import { VALID_REFERENCE } from "./entities";
import type {
  ParseFailure,
  ParseOutcome,
  XmlAttribute,
  XmlElement,
} from "../types";

const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

/**
 * Find the first '&' outside comments and CDATA that does not start a
 * predefined or numeric reference. The validator accepts any "&word;".
 */
function findUndefinedReference(text: string): ParseFailure | null {
  for (const span of splitSpans(text)) {
    if (span.kind === "comment" || span.kind === "cdata") continue;

    let index = span.value.indexOf("&");
    while (index !== -1) {
      const rest = span.value.slice(index);
      if (!VALID_REFERENCE.test(rest)) {
        const { line, column } = positionAt(text, span.start + index);
        const named = /^&([A-Za-z_][\w.-]*);/.exec(rest);
        const message = named
          ? `Entity '&${named[1]};' is not defined.`
          : "char '&' is not expected.";
        return { message, line, column };
      }
      index = span.value.indexOf("&", index + 1);
    }
  }
  return null;
}

function splitQualifiedName(name: string): [string | null, string] {
  const colon = name.indexOf(":");
  return colon === -1
    ? [null, name]
    : [name.slice(0, colon), name.slice(colon + 1)];
}

function collectText(nodes: ChildNode[]): string {
  let text = "";
  for (const node of nodes) {
    if (isText(node)) {
      text += node.data;
    } else if (isCDATA(node)) {
      text += collectText(node.children);
    }
  }
  return text;
}

function toXmlElement(
  node: Element,
  parentScope: ReadonlyMap<string, string>,
): XmlElement {
  const attributes: XmlAttribute[] = Object.entries(node.attribs).map(
    ([name, value]) => ({ name, value }),
  );

  let scope = parentScope;
  const declarations = attributes.filter(
    ({ name }) => name === "xmlns" || name.startsWith("xmlns:"),
  );
  if (declarations.length > 0) {
    const nested = new Map(parentScope);
    for (const { name, value } of declarations) {
      nested.set(name === "xmlns" ? "" : name.slice("xmlns:".length), value);
    }
    scope = nested;
  }

  const [prefix, localName] = splitQualifiedName(node.name);

  return {
    tag: node.name,
    localName,
    prefix,
    // xmlns="" undeclares the default namespace
    namespaceUri: scope.get(prefix ?? "") || null,
    attributes,
    text: collectText(node.children),
    children: node.children
      .filter(isTag)
      .map((child) => toXmlElement(child, scope)),
  };
}

/**
 * Parse text into a ParsedDocument, or report the first well-formedness error
 */
export function parseXml(text: string): ParseOutcome {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, failure: { message: msg, line, column: col } };
  }

  const undefinedReference = findUndefinedReference(text);
  if (undefinedReference) {
    return { ok: false, failure: undefinedReference };
  }

  const $ = load(text, { xml: true });
  const [root] = $.root().children().toArray();
  if (!root) {
    return {
      ok: false,
      failure: { message: "Start tag expected.", line: 1, column: 1 },
    };
  }

  const scope = new Map([["xml", XML_NAMESPACE]]);
  return { ok: true, document: { root: toXmlElement(root, scope) } };
}

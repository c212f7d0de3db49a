/**
 * Graph Extractor
 * Reads nodes and edges from a parsed GraphML document.
 */

import { SchemaMismatchError } from "../errors";
import { GraphModelBuilder } from "./model";
import type { GraphModel, ParsedDocument, XmlElement } from "../types";

export interface DiscardedEdge {
  source: string | null;
  target: string | null;
}

export interface ExtractOptions {
  // Called for each edge dropped for lacking a source or target
  onDiscardedEdge?: (edge: DiscardedEdge) => void;
}

/**
 * Name lookups scoped to the root's namespace
 *
 * Namespace-qualified matches win; unqualified names are the fallback for
 * documents that mix namespaced and bare elements.
 */
class ElementLookup {
  constructor(private namespace: string | null) {}

  private qualified(element: XmlElement, name: string): boolean {
    return (
      this.namespace !== null &&
      element.namespaceUri === this.namespace &&
      element.localName === name
    );
  }

  private unqualified(element: XmlElement, name: string): boolean {
    return element.namespaceUri === null && element.tag === name;
  }

  /**
   * Direct children named `name`
   */
  children(parent: XmlElement, name: string): XmlElement[] {
    const namespaced = parent.children.filter((child) =>
      this.qualified(child, name),
    );
    if (namespaced.length > 0) {
      return namespaced;
    }
    return parent.children.filter((child) => this.unqualified(child, name));
  }

  /**
   * First element named `name` in depth-first order, the root included
   */
  first(root: XmlElement, name: string): XmlElement | null {
    return (
      findFirst(root, (element) => this.qualified(element, name)) ??
      findFirst(root, (element) => this.unqualified(element, name))
    );
  }
}

function findFirst(
  element: XmlElement,
  predicate: (element: XmlElement) => boolean,
): XmlElement | null {
  if (predicate(element)) {
    return element;
  }
  for (const child of element.children) {
    const found = findFirst(child, predicate);
    if (found) {
      return found;
    }
  }
  return null;
}

function attribute(element: XmlElement, name: string): string | null {
  return element.attributes.find((attr) => attr.name === name)?.value ?? null;
}

/**
 * Map declared key ids to their attr.name: <key id="d0" attr.name="label"/>
 */
function readKeyNames(
  root: XmlElement,
  lookup: ElementLookup,
): Map<string, string> {
  const names = new Map<string, string>();
  for (const key of lookup.children(root, "key")) {
    const id = attribute(key, "id");
    const name = attribute(key, "attr.name");
    if (id && name) {
      names.set(id, name);
    }
  }
  return names;
}

/**
 * Fold <data key="..."> children into a property bag
 */
function readProperties(
  element: XmlElement,
  lookup: ElementLookup,
  keyNames: ReadonlyMap<string, string>,
): Map<string, string> {
  const properties = new Map<string, string>();
  for (const data of lookup.children(element, "data")) {
    const key = attribute(data, "key");
    if (key) {
      properties.set(keyNames.get(key) ?? key, data.text);
    }
  }
  return properties;
}

/**
 * Extract the graph model from a parsed document
 *
 * Only node and edge elements directly under the first graph element count.
 * Edges lacking a source or target are dropped without failing.
 *
 * @throws SchemaMismatchError when the document has no graph element
 */
export function extractGraph(
  document: ParsedDocument,
  options: ExtractOptions = {},
): GraphModel {
  const { root } = document;
  const lookup = new ElementLookup(root.namespaceUri);

  const container = lookup.first(root, "graph");
  if (!container) {
    throw new SchemaMismatchError(
      "Could not find graph element in the GraphML document",
    );
  }

  const keyNames = readKeyNames(root, lookup);
  const builder = new GraphModelBuilder();

  for (const node of lookup.children(container, "node")) {
    const id = attribute(node, "id");
    if (id) {
      builder.addNode(id, readProperties(node, lookup, keyNames));
    }
  }

  for (const edge of lookup.children(container, "edge")) {
    const source = attribute(edge, "source");
    const target = attribute(edge, "target");
    if (!source || !target) {
      options.onDiscardedEdge?.({ source, target });
      continue;
    }
    builder.addEdge(source, target, readProperties(edge, lookup, keyNames));
  }

  return builder.build();
}

/**
 * GraphML Writer
 * Serialises a graph model as a GraphML document using fast-xml-parser's builder.
 */

import { XMLBuilder } from "fast-xml-parser";
import type { GraphModel, PropertyBag } from "../types";

export const GRAPHML_NAMESPACES = {
  xmlns: "http://graphml.graphdrawing.org/xmlns",
  "xmlns:xsi": "http://www.w3.org/2001/XMLSchema-instance",
  "xmlns:y": "http://www.yworks.com/xml/graphml",
  "xsi:schemaLocation":
    "http://graphml.graphdrawing.org/xmlns http://graphml.graphdrawing.org/xmlns/1.0/graphml.xsd",
} as const;

export type KeyDomain = "node" | "edge";

export interface KeyDeclaration {
  id: string;
  for: KeyDomain;
  name: string;
}

export const STANDARD_KEYS: readonly KeyDeclaration[] = [
  { id: "d0", for: "node", name: "label" },
  { id: "d1", for: "node", name: "type" },
  { id: "d2", for: "node", name: "desc" },
  { id: "d3", for: "node", name: "team" },
  { id: "d4", for: "node", name: "resp" },
  { id: "d5", for: "node", name: "crit" },
  { id: "e0", for: "edge", name: "label" },
  { id: "e1", for: "edge", name: "cond" },
];

const KEY_PREFIX: Record<KeyDomain, string> = { node: "d", edge: "e" };

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: true,
  indentBy: "  ",
  suppressBooleanAttributes: false,
});

/**
 * Element shape understood by the builder: "@_" attributes, "#text" content
 */
type XmlNode = {
  [name: string]: string | XmlNode | XmlNode[];
};

/**
 * Key declaration registry
 * Starts from the standard keys and assigns the next free id per domain to
 * any other property name.
 */
class KeyRegistry {
  private keys: KeyDeclaration[] = [...STANDARD_KEYS];

  resolve(domain: KeyDomain, name: string): string {
    const existing = this.keys.find(
      (key) => key.for === domain && key.name === name,
    );
    if (existing) {
      return existing.id;
    }

    const count = this.keys.filter((key) => key.for === domain).length;
    const id = `${KEY_PREFIX[domain]}${count}`;
    this.keys.push({ id, for: domain, name });
    return id;
  }

  toXml(): XmlNode[] {
    return this.keys.map((key) => ({
      "@_id": key.id,
      "@_for": key.for,
      "@_attr.name": key.name,
      "@_attr.type": "string",
    }));
  }
}

function dataElements(
  properties: PropertyBag,
  domain: KeyDomain,
  registry: KeyRegistry,
): XmlNode[] {
  const data: XmlNode[] = [];
  for (const [name, value] of properties) {
    if (value === "") continue;
    data.push({ "@_key": registry.resolve(domain, name), "#text": value });
  }
  return data;
}

function withData(element: XmlNode, data: XmlNode[]): XmlNode {
  return data.length > 0 ? { ...element, data } : element;
}

/**
 * Render a graph model as a GraphML document
 */
export function writeGraphml(graph: GraphModel): string {
  const registry = new KeyRegistry();

  // Data first: it registers the generated keys
  const nodes = graph.nodes.map((node) =>
    withData(
      { "@_id": node.id },
      dataElements(node.properties, "node", registry),
    ),
  );
  const edges = graph.edges.map((edge) =>
    withData(
      { "@_source": edge.source, "@_target": edge.target },
      dataElements(edge.properties, "edge", registry),
    ),
  );

  const container: XmlNode = { "@_id": "G", "@_edgedefault": "directed" };
  if (nodes.length > 0) container.node = nodes;
  if (edges.length > 0) container.edge = edges;

  const root: XmlNode = {};
  for (const [name, value] of Object.entries(GRAPHML_NAMESPACES)) {
    root[`@_${name}`] = value;
  }
  root.key = registry.toXml();
  root.graph = container;

  return xmlBuilder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    graphml: root,
  });
}

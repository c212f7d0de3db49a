/**
 * Graph model shared by every converter
 */

/** String-keyed property bag; iteration follows insertion order. */
export type PropertyBag = ReadonlyMap<string, string>;

export interface GraphNode {
  readonly id: string;
  // Display label, defaults to id
  readonly name: string;
  readonly properties: PropertyBag;
}

/**
 * Endpoints are not checked against the node set. Renderers skip edges whose
 * source or target is missing.
 */
export interface GraphEdge {
  readonly source: string;
  readonly target: string;
  readonly properties: PropertyBag;
}

export interface GraphModel {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
}

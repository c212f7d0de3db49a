/**
 * Graph model construction
 */

import type { GraphEdge, GraphModel, GraphNode } from "../types";

/**
 * Collects nodes and edges in insertion order and keeps node ids unique
 */
export class GraphModelBuilder {
  private nodes: GraphNode[] = [];
  private edges: GraphEdge[] = [];
  private ids = new Set<string>();

  /**
   * Add a node; returns false and keeps the existing one when the id is taken
   */
  addNode(
    id: string,
    properties: ReadonlyMap<string, string> = new Map(),
    name?: string,
  ): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    this.nodes.push(
      Object.freeze({
        id,
        name: name || properties.get("label") || id,
        properties: new Map(properties),
      }),
    );
    return true;
  }

  addEdge(
    source: string,
    target: string,
    properties: ReadonlyMap<string, string> = new Map(),
  ): void {
    this.edges.push(
      Object.freeze({ source, target, properties: new Map(properties) }),
    );
  }

  hasNode(id: string): boolean {
    return this.ids.has(id);
  }

  build(): GraphModel {
    return Object.freeze({
      nodes: Object.freeze([...this.nodes]),
      edges: Object.freeze([...this.edges]),
    });
  }
}

/**
 * Edges whose source or target is not among the model's nodes
 */
export function findDanglingEdges(graph: GraphModel): GraphEdge[] {
  const ids = new Set(graph.nodes.map((node) => node.id));
  return graph.edges.filter(
    (edge) => !ids.has(edge.source) || !ids.has(edge.target),
  );
}

/**
 * Display text for an edge: label, else cond, else condition
 */
export function edgeLabel(edge: GraphEdge): string | null {
  return (
    edge.properties.get("label") ||
    edge.properties.get("cond") ||
    edge.properties.get("condition") ||
    null
  );
}

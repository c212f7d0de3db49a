/**
 * Diagram markup renderer
 * Sequence and flowchart text markup built from Handlebars templates.
 */

import { compileTemplate, getDefaultTemplate } from "../templates";
import { edgeLabel } from "../graph/model";
import { sanitizeDisplayName } from "../utils/sanitize-id";
import { classifyNode } from "./shapes";
import type { NodeShape } from "./shapes";
import type { DiagramType, GraphModel } from "../types";

export interface EdgeLine {
  source: string;
  target: string;
  label: string | null;
}

export interface NoteLine {
  name: string;
  text: string;
}

export interface ShapeLine {
  name: string;
  shape: NodeShape;
}

export interface SequenceView {
  edges: EdgeLine[];
  notes: NoteLine[];
}

export interface FlowchartView {
  nodes: ShapeLine[];
  edges: EdgeLine[];
}

export type DiagramView = SequenceView & FlowchartView;

export type DiagramTemplate = HandlebarsTemplateDelegate<DiagramView>;

// Node properties shown in sequence notes, in order
const NOTE_FIELDS: readonly [string, string][] = [
  ["team", "Team"],
  ["resp", "Responsibilities"],
  ["cond", "Condition"],
];

/**
 * Build everything either template may reference
 *
 * Edges whose source or target is not a node are left out.
 */
export function buildDiagramView(graph: GraphModel): DiagramView {
  const names = new Map(
    graph.nodes.map((node) => [node.id, sanitizeDisplayName(node.name)]),
  );

  const edges: EdgeLine[] = [];
  for (const edge of graph.edges) {
    const source = names.get(edge.source);
    const target = names.get(edge.target);
    if (source === undefined || target === undefined) continue;
    edges.push({ source, target, label: edgeLabel(edge) });
  }

  const notes: NoteLine[] = [];
  const nodes: ShapeLine[] = [];
  for (const node of graph.nodes) {
    const name = sanitizeDisplayName(node.name);
    nodes.push({ name, shape: classifyNode(node) });

    const parts = NOTE_FIELDS.flatMap(([key, title]) => {
      const value = node.properties.get(key);
      return value ? [`${title}: ${value}`] : [];
    });
    if (parts.length > 0) {
      notes.push({ name, text: parts.join(", ") });
    }
  }

  return { edges, notes, nodes };
}

/**
 * Render diagram markup; output always ends with exactly one newline
 *
 * @param template - Compiled user template; the built-in one for `type` otherwise
 */
export function renderUml(
  graph: GraphModel,
  type: DiagramType = "sequence",
  template?: DiagramTemplate,
): string {
  const render =
    template ?? compileTemplate<DiagramView>(getDefaultTemplate(type));
  return `${render(buildDiagramView(graph)).trimEnd()}\n`;
}

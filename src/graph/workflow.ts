/**
 * Workflow Reader
 * Turns a workflow JSON definition into the graph model written as GraphML.
 */

import { SchemaMismatchError } from "../errors";
import { GraphModelBuilder } from "./model";
import { sanitizeId } from "../utils/sanitize-id";
import { WorkflowEdgeSchema, WorkflowNodeSchema } from "../types";
import type { GraphModel, WorkflowNode } from "../types";

export const START_NODE_ID = "start";

type TextField = string | string[] | undefined;

function joinText(value: TextField): string {
  return Array.isArray(value) ? value.join("; ") : (value ?? "");
}

/**
 * Keep only the non-empty entries, in the order given
 */
function compact(entries: [string, string][]): Map<string, string> {
  return new Map(entries.filter(([, value]) => value !== ""));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaMismatchError(`Invalid JSON format: ${reason}`);
  }
}

/**
 * Read a workflow definition, given as JSON text or an already parsed value
 *
 * Node entries without an id are skipped. An explicit `edges` array takes
 * precedence over each node's `next_handoff_destinations`.
 *
 * @throws SchemaMismatchError on invalid JSON, a missing flow or a missing nodes array
 */
export function readWorkflow(json: unknown): GraphModel {
  const data = typeof json === "string" ? parseJson(json) : json;

  if (!isRecord(data) || !isRecord(data.flow)) {
    throw new SchemaMismatchError("Invalid JSON format: Missing 'flow' element");
  }
  const { flow } = data;
  if (!Array.isArray(flow.nodes)) {
    throw new SchemaMismatchError(
      "Invalid JSON format: Missing or invalid 'nodes' array",
    );
  }

  const builder = new GraphModelBuilder();
  const entryCondition =
    typeof flow.entry_condition === "string" ? flow.entry_condition : "";

  if (entryCondition) {
    builder.addNode(
      START_NODE_ID,
      compact([
        ["label", "Start"],
        ["type", "start"],
        ["desc", entryCondition],
      ]),
    );
  }

  const nodes: WorkflowNode[] = [];
  for (const entry of flow.nodes) {
    const parsed = WorkflowNodeSchema.safeParse(entry);
    if (parsed.success) {
      nodes.push(parsed.data);
    }
  }

  for (const [index, node] of nodes.entries()) {
    const id = sanitizeId(node.id);
    builder.addNode(
      id,
      compact([
        ["label", node.name || node.id],
        ["type", "process"],
        ["desc", joinText(node.entry_condition)],
        ["team", joinText(node.responsible_team)],
        ["resp", joinText(node.core_responsibilities)],
        ["crit", joinText(node.completion_criteria)],
      ]),
    );

    if (index === 0 && entryCondition) {
      builder.addEdge(START_NODE_ID, id, new Map([["cond", entryCondition]]));
    }
  }

  if (Array.isArray(flow.edges)) {
    for (const entry of flow.edges) {
      const parsed = WorkflowEdgeSchema.safeParse(entry);
      if (!parsed.success) continue;

      const { from, to, condition } = parsed.data;
      builder.addEdge(
        sanitizeId(from),
        sanitizeId(to),
        compact([["cond", condition ?? ""]]),
      );
    }
  } else {
    for (const node of nodes) {
      for (const target of node.next_handoff_destinations ?? []) {
        builder.addEdge(sanitizeId(node.id), sanitizeId(target));
      }
    }
  }

  return builder.build();
}

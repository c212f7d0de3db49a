/**
 * Node shape classification from the `type` property
 */

import type { GraphNode } from "../types";

export type NodeShape = "start" | "end" | "decision" | "io" | "process";

// Checked in order against the lower-cased type, by substring
const SHAPE_MARKERS: readonly [NodeShape, readonly string[]][] = [
  ["start", ["start", "begin"]],
  ["end", ["end", "stop"]],
  ["decision", ["decision", "condition"]],
  ["io", ["input", "output"]],
];

export function classifyNode(node: GraphNode): NodeShape {
  const type = node.properties.get("type")?.toLowerCase();
  if (!type) {
    return "process";
  }
  const match = SHAPE_MARKERS.find(([, markers]) =>
    markers.some((marker) => type.includes(marker)),
  );
  return match ? match[0] : "process";
}

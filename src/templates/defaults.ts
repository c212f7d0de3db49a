/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

import type { DiagramType } from "../types";

const SEQUENCE_TEMPLATE = `# Sequence Diagram
# Generated from GraphML

{{#each edges}}
{{source}} -> {{target}}{{#if label}}: {{label}}{{/if}}
{{/each}}
{{#each notes}}
note right of {{name}}: {{text}}
{{/each}}
`;

const FLOWCHART_TEMPLATE = `# Flowchart
# Generated from GraphML

{{#each nodes}}
{{name}}[{{shape}}]
{{/each}}

{{#each edges}}
{{source}} -> {{target}}{{#if label}}: {{label}}{{/if}}
{{/each}}
`;

export function getDefaultTemplate(type: DiagramType): string {
  return type === "flowchart" ? FLOWCHART_TEMPLATE : SEQUENCE_TEMPLATE;
}

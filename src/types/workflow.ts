/**
 * Workflow JSON schema
 * Only `id` is required; the other fields the converter reads are taken when
 * usable and ignored otherwise.
 */

import { z } from "zod";

type Scalar = string | number | boolean;

function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

// Identifiers and labels written as numbers are read as their text
const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

// Free text fields sometimes arrive as lists of sentences; anything else is ignored
const TextFieldSchema = z
  .union([
    ScalarSchema,
    z.array(z.unknown()).transform((items) => items.filter(isScalar).map(String)),
  ])
  .optional()
  .catch(undefined);

const OptionalScalarSchema = ScalarSchema.optional().catch(undefined);

export const WorkflowNodeSchema = z
  .object({
    id: ScalarSchema,
    name: OptionalScalarSchema,
    entry_condition: TextFieldSchema,
    responsible_team: TextFieldSchema,
    core_responsibilities: TextFieldSchema,
    completion_criteria: TextFieldSchema,
    next_handoff_destinations: z
      .array(z.unknown())
      .transform((items) =>
        items.filter((item): item is string => typeof item === "string"),
      )
      .optional()
      .catch(undefined),
  })
  .passthrough();

export const WorkflowEdgeSchema = z
  .object({
    from: ScalarSchema,
    to: ScalarSchema,
    condition: OptionalScalarSchema,
  })
  .passthrough();

export type WorkflowNode = z.infer<typeof WorkflowNodeSchema>;
export type WorkflowEdge = z.infer<typeof WorkflowEdgeSchema>;

/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  // Tried in order when the document is not valid UTF-8
  encodings: z.array(z.string()).min(1),
});

export const RepairConfigSchema = z.object({
  autoFix: z.boolean(),
  backup: z.boolean(),
  // Default namespace injected on a <graphml> root that declares none
  namespace: z.string(),
});

export const OutputConfigSchema = z.object({
  diagramType: z.enum(["sequence", "flowchart"]),
});

export const TemplatesConfigSchema = z.object({
  sequence: z.string().nullable(),
  flowchart: z.string().nullable(),
});

export const IntermediateConfigSchema = z.object({
  // null -> OS temp directory
  directory: z.string().nullable(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  repair: RepairConfigSchema,
  output: OutputConfigSchema,
  templates: TemplatesConfigSchema,
  intermediate: IntermediateConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    input: InputConfigSchema.partial().optional(),
    repair: RepairConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    templates: TemplatesConfigSchema.partial().optional(),
    intermediate: IntermediateConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type RepairConfig = z.infer<typeof RepairConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type IntermediateConfig = z.infer<typeof IntermediateConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
export type DiagramType = OutputConfig["diagramType"];
export type LogLevel = LoggingConfig["level"];

export interface ConfigError {
  path: string;
  error: unknown;
}

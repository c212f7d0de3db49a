/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  RepairConfig,
  OutputConfig,
  TemplatesConfig,
  IntermediateConfig,
  LoggingConfig,
  DiagramType,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Graph model
export type { GraphModel, GraphNode, GraphEdge, PropertyBag } from "./graph";

// Parsed XML
export type {
  ParsedDocument,
  XmlElement,
  XmlAttribute,
  ParseFailure,
  ParseOutcome,
} from "./document";

// Workflow JSON
export type { WorkflowNode, WorkflowEdge } from "./workflow";
export { WorkflowNodeSchema, WorkflowEdgeSchema } from "./workflow";

// Formats
export type { InputFormat, TargetFormat, CsvColumn, CsvRow } from "./formats";
export { INPUT_EXTENSIONS, TARGET_EXTENSIONS, CSV_COLUMNS } from "./formats";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  IssueOf,
  FileIssue,
  RepairIssue,
  EdgeIssue,
  ResourceIssue,
  FileIssueReason,
  EdgeIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";

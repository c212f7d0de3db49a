export { GraphModelBuilder, findDanglingEdges, edgeLabel } from "./model";
export { extractGraph } from "./extractor";
export type { DiscardedEdge, ExtractOptions } from "./extractor";
export { readWorkflow, START_NODE_ID } from "./workflow";
export { writeGraphml, STANDARD_KEYS, GRAPHML_NAMESPACES } from "./writer";
export type { KeyDeclaration, KeyDomain } from "./writer";

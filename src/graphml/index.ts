export {
  fixGraphmlFile,
  normalizeGraphml,
  addNamespaces,
  addEdgeDefault,
  addStandardKeys,
  fixNodeIds,
} from "./fix";
export type { FixOptions, FixResult, GraphmlFix } from "./fix";
export { verifyGraphmlFile, findProblematicContent } from "./verify";
export type { GraphmlDiagnostics } from "./verify";

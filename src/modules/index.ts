/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export {
  detectFormat,
  parseTargetFormat,
  assertSupportedChain,
  resolveOutputPath,
} from "./detector";
export { readGraph, readWorkflowFile, readGraphmlFile } from "./reader";
export { render, write } from "./writer";
export { stats, formatDuration } from "./stats";

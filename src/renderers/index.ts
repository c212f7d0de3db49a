export { renderUml, buildDiagramView } from "./uml";
export type {
  DiagramTemplate,
  DiagramView,
  EdgeLine,
  NoteLine,
  ShapeLine,
  SequenceView,
  FlowchartView,
} from "./uml";
export { renderCsv, renderCsvRows, toCsv, quoteField } from "./csv";
export { classifyNode } from "./shapes";
export type { NodeShape } from "./shapes";

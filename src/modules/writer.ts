/**
 * Writer Module
 * Renders the graph model in the target format and writes it to disk
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { writeGraphml } from "../graph";
import { renderCsv, renderUml } from "../renderers";
import type { DiagramView } from "../renderers";
import { loadDiagramTemplate } from "../templates";
import type {
  ConversionContext,
  DiagramType,
  GraphModel,
  TargetFormat,
} from "../types";

/**
 * Render a graph in the target format
 * A user template configured for the diagram type replaces the built-in one.
 */
export async function render(
  ctx: ConversionContext,
  graph: GraphModel,
  target: TargetFormat,
  diagramType: DiagramType = ctx.config.output.diagramType,
): Promise<string> {
  switch (target) {
    case "graphml":
      return writeGraphml(graph);
    case "csv":
      return renderCsv(graph);
    case "uml": {
      const template = await loadDiagramTemplate<DiagramView>(
        diagramType,
        ctx.config.templates,
      );
      return renderUml(graph, diagramType, template);
    }
  }
}

/**
 * Render and write; the output's parent directories are created here, once
 * there is something to write
 */
export async function write(
  ctx: ConversionContext,
  graph: GraphModel,
  target: TargetFormat,
  output: string,
  diagramType?: DiagramType,
): Promise<void> {
  const content = await render(ctx, graph, target, diagramType);
  await mkdir(path.dirname(path.resolve(output)), { recursive: true });
  await writeFile(output, content, "utf-8");
  ctx.logger.debug(`Wrote ${target} output to ${output}`);
}

/**
 * Reader Module
 * Loads an input file into the graph model
 */

import { readFile } from "fs/promises";
import { FileNotFoundError } from "../errors";
import { extractGraph, findDanglingEdges, readWorkflow } from "../graph";
import { loadXmlFile } from "../xml/loader";
import { fileExists } from "../utils/file-exists";
import type { ConversionContext, GraphModel, InputFormat } from "../types";

/**
 * Read a workflow JSON file
 *
 * @throws SchemaMismatchError when the JSON is invalid or has no flow/nodes
 */
export async function readWorkflowFile(
  ctx: ConversionContext,
  file: string,
): Promise<GraphModel> {
  if (!(await fileExists(file))) {
    throw new FileNotFoundError(file);
  }

  const graph = readWorkflow(await readFile(file, "utf-8"));
  ctx.logger.debug(
    `Read workflow ${file}: ${graph.nodes.length} nodes, ${graph.edges.length} edges`,
  );
  return graph;
}

/**
 * Load a GraphML file through the repair ladder and extract its graph
 *
 * Repairs, discarded edges and dangling edges are recorded on the tracker.
 */
export async function readGraphmlFile(
  ctx: ConversionContext,
  file: string,
): Promise<GraphModel> {
  const { config, tracker, logger } = ctx;

  const loaded = await loadXmlFile(file, {
    autoFix: config.repair.autoFix,
    encodings: config.input.encodings,
    namespace: config.repair.namespace,
    logger,
  });

  if (loaded.stage !== "direct") {
    tracker.trackRepair(file, loaded.stage);
    logger.debug(`Repaired ${file} (${loaded.stage} stage)`);
  }

  const graph = extractGraph(loaded.document, {
    onDiscardedEdge: ({ source, target }) => {
      tracker.trackEdgeIssue(
        file,
        `${source ?? "?"} -> ${target ?? "?"}`,
        "missing-endpoint",
      );
    },
  });

  for (const edge of findDanglingEdges(graph)) {
    tracker.trackEdgeIssue(file, `${edge.source} -> ${edge.target}`, "dangling");
  }

  logger.debug(
    `Extracted ${file}: ${graph.nodes.length} nodes, ${graph.edges.length} edges`,
  );
  return graph;
}

export async function readGraph(
  ctx: ConversionContext,
  file: string,
  format: InputFormat,
): Promise<GraphModel> {
  return format === "json"
    ? readWorkflowFile(ctx, file)
    : readGraphmlFile(ctx, file);
}

/**
 * Converter - Conversion orchestrator
 * Chains readers and writers per input/target pair with no format logic of its own
 */

import { mkdir, rm } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { FileNotFoundError } from "./errors";
import { IdGenerator } from "./utils/id-generator";
import { fileExists } from "./utils/file-exists";
import * as modules from "./modules";
import type {
  ConversionContext,
  DiagramType,
  GraphModel,
  ProcessingStats,
  TargetFormat,
} from "./types";

export interface ConvertOptions {
  // File, or an existing directory that receives <stem>.<ext>
  output?: string;
  // Overrides config.output.diagramType for markup output
  diagramType?: DiagramType;
}

export interface ConversionResult {
  input: string;
  output: string;
}

export class Converter {
  private ids = new IdGenerator();

  constructor(private ctx: ConversionContext) {}

  /**
   * Convert one file and return the path written
   *
   * @throws FileNotFoundError, UnsupportedFormatError, SchemaMismatchError or
   * MalformedDocumentError
   */
  async convert(
    input: string,
    target: TargetFormat,
    options: ConvertOptions = {},
  ): Promise<string> {
    if (!(await fileExists(input))) {
      throw new FileNotFoundError(input);
    }

    const format = modules.detectFormat(input);
    modules.assertSupportedChain(format, target);

    const output = await modules.resolveOutputPath(
      input,
      target,
      options.output,
    );

    const graph =
      format === "json" && target !== "graphml"
        ? await this.readThroughIntermediate(input)
        : await modules.readGraph(this.ctx, input, format);

    await modules.write(this.ctx, graph, target, output, options.diagramType);
    this.ctx.tracker.addGraph(graph.nodes.length, graph.edges.length);
    this.ctx.logger.debug(`Converted ${input} -> ${output}`);

    return output;
  }

  /**
   * Convert every input, recording failures on the tracker and moving on
   * With several inputs, `output` names a directory.
   */
  async run(
    inputs: readonly string[],
    target: TargetFormat,
    options: ConvertOptions = {},
  ): Promise<{ results: ConversionResult[]; stats: ProcessingStats }> {
    const { tracker, logger } = this.ctx;
    tracker.setTotalFiles(inputs.length);

    if (options.output && inputs.length > 1) {
      await mkdir(options.output, { recursive: true });
    }

    const results: ConversionResult[] = [];
    for (const input of inputs) {
      try {
        const output = await this.convert(input, target, options);
        results.push({ input, output });
        tracker.incrementSuccessful();
      } catch (error) {
        tracker.trackError(input, error, "file");
        tracker.incrementFailed();
        logger.debug(
          `Failed ${input}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return { results, stats: tracker.getStats() };
  }

  /**
   * Workflow JSON to graph by way of a temporary GraphML file, which is
   * removed whether or not reading it back succeeds
   */
  private async readThroughIntermediate(input: string): Promise<GraphModel> {
    const workflow = await modules.readWorkflowFile(this.ctx, input);

    const directory = this.ctx.config.intermediate.directory ?? tmpdir();
    await mkdir(directory, { recursive: true });
    const artifact = path.join(
      directory,
      `${path.parse(input).name}-${this.ids.generate()}.graphml`,
    );

    try {
      await modules.write(this.ctx, workflow, "graphml", artifact);
      return await modules.readGraphmlFile(this.ctx, artifact);
    } finally {
      await rm(artifact, { force: true });
      this.ctx.logger.debug(`Removed intermediate ${artifact}`);
    }
  }
}

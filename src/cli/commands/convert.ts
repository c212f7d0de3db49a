/**
 * Convert command - Loads config and converts each input
 */

import ora from "ora";
import { z } from "zod";
import { Converter } from "../../converter";
import { loadConfig } from "../../utils/load-config";
import { Logger } from "../../utils/logger";
import { Tracker } from "../../utils/tracker";
import * as modules from "../../modules";
import { reportFailure } from "./report";
import type { ConversionContext } from "../../types";

const ConvertOptionsSchema = z.object({
  format: z.string(),
  output: z.string().optional(),
  type: z.enum(["sequence", "flowchart"]).optional(),
  fix: z.boolean().default(true),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

export async function convertCommand(
  inputs: string[],
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);
    const target = modules.parseTargetFormat(options.format);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    config.repair.autoFix = options.fix && config.repair.autoFix;
    if (options.type) {
      config.output.diagramType = options.type;
    }

    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx: ConversionContext = {
      config,
      tracker,
      logger: new Logger(config.logging.level),
      verbose: options.verbose,
    };

    spinner.text = "Scanning files...";
    const files = await modules.scan(inputs);
    if (files.length === 0) {
      spinner.fail("No input files matched");
      process.exitCode = 1;
      return;
    }

    spinner.text = `Converting ${files.length} file(s) to ${target}...`;
    const converter = new Converter(ctx);
    const { results, stats } = await converter.run(files, target, {
      output: options.output,
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    for (const { output } of results) {
      console.log(`  Created ${output}`);
    }
    modules.stats(ctx);

    if (stats.failedFiles > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure(spinner, "Conversion failed", error);
  }
}

/**
 * Fix command - Repairs a GraphML file on disk
 */

import ora from "ora";
import chalk from "chalk";
import { z } from "zod";
import { fixGraphmlFile, verifyGraphmlFile } from "../../graphml";
import { loadConfig } from "../../utils/load-config";
import { Logger } from "../../utils/logger";
import { reportFailure } from "./report";

const FixOptionsSchema = z.object({
  output: z.string().optional(),
  backup: z.boolean().default(true),
  config: z.string().optional(),
});

type Options = z.input<typeof FixOptionsSchema>;

export async function fixCommand(input: string, opts: Options): Promise<void> {
  const spinner = ora({ text: `Fixing ${input}...`, indent: 2 }).start();

  try {
    const options = FixOptionsSchema.parse(opts);
    const { config } = await loadConfig(options.config);

    const result = await fixGraphmlFile(input, {
      output: options.output,
      backup: options.backup && config.repair.backup,
      load: {
        encodings: config.input.encodings,
        namespace: config.repair.namespace,
        logger: new Logger(config.logging.level),
      },
    });

    spinner.succeed(`Fixed GraphML file saved to: ${result.output}`);

    if (result.backup) {
      console.log(`  Backup of original file created at: ${result.backup}`);
    } else if (result.output !== input) {
      console.log(`  Original file preserved at: ${input}`);
    }
    if (result.stage !== "direct") {
      console.log(chalk.dim(`  Parsed after the ${result.stage} repair stage`));
    }
    if (result.fixes.length > 0) {
      console.log(chalk.dim(`  Structure fixes: ${result.fixes.join(", ")}`));
    }

    const diagnostics = await verifyGraphmlFile(result.output);
    if (diagnostics.canParse) {
      console.log(
        `  Verified: ${diagnostics.nodeCount} nodes and ${diagnostics.edgeCount} edges`,
      );
    } else {
      console.log(
        chalk.yellow(
          `  Warning: fixed file still has parsing issues: ${diagnostics.parseError}`,
        ),
      );
    }
  } catch (error) {
    reportFailure(spinner, "Fix failed", error);
  }
}

/**
 * Shared failure output for commands
 */

import chalk from "chalk";
import type { Ora } from "ora";
import { isConversionError } from "../../errors";

export function reportFailure(spinner: Ora, title: string, error: unknown): void {
  spinner.fail(title);
  if (isConversionError(error)) {
    console.error(chalk.red(error.message));
  } else {
    console.error(error);
  }
  process.exit(1);
}

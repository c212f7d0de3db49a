/**
 * Verify command - Prints GraphML diagnostics without changing the file
 */

import chalk from "chalk";
import { verifyGraphmlFile } from "../../graphml";

export async function verifyCommand(input: string): Promise<void> {
  const diagnostics = await verifyGraphmlFile(input);

  console.log(chalk.bold("GraphML File Diagnostics:"));
  console.log(`  file: ${diagnostics.file}`);
  console.log(`  exists: ${diagnostics.exists}`);
  console.log(`  size: ${diagnostics.size}`);
  console.log(
    `  can parse: ${diagnostics.canParse ? chalk.green("yes") : chalk.red("no")}`,
  );
  if (diagnostics.parseError) {
    console.log(`  parse error: ${chalk.red(diagnostics.parseError)}`);
  }
  console.log(`  nodes: ${diagnostics.nodeCount}`);
  console.log(`  edges: ${diagnostics.edgeCount}`);

  if (diagnostics.problems.length > 0) {
    console.log("  problematic content:");
    for (const problem of diagnostics.problems) {
      console.log(`    - ${chalk.yellow(problem)}`);
    }
  }

  if (!diagnostics.canParse) {
    process.exitCode = 1;
  }
}

#!/usr/bin/env tsx

/**
 * CLI entry point for the GraphML diagram converter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { fixCommand } from "./commands/fix";
import { verifyCommand } from "./commands/verify";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("graphml-convert")
  .description(
    "Convert workflow JSON and GraphML into GraphML, diagram markup or CSV",
  )
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("<inputs...>", "Input files or glob patterns (.json, .graphml, .xml)")
  .requiredOption("-f, --format <format>", "Output format: graphml, uml or csv")
  .option("-o, --output <path>", "Output file, or directory for several inputs")
  .option("-t, --type <type>", "Diagram type for uml output: sequence or flowchart")
  .option("--no-fix", "Disable automatic repair of malformed XML")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

program
  .command("fix <input>")
  .description("Repair a malformed GraphML file")
  .option("-o, --output <path>", "Write the fixed file here instead of overwriting")
  .option("--no-backup", "Write <name>_fixed.<ext> instead of a .bak backup")
  .option("-c, --config <path>", "Path to custom config file")
  .action(fixCommand);

program
  .command("verify <input>")
  .description("Check whether a GraphML file parses and report problems")
  .action(verifyCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
